import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { GameSchema } from '../types';
import { createLogger, type Logger } from '../utils/logger';
import type { DecisionRecord, QuoteQuery, QuoteRecord, QuoteStore, StoredQuote } from './QuoteStore';

interface QuoteRow {
  id: number;
  item_key: string;
  item_name: string;
  league: string;
  game: string;
  source_id: string;
  chaos_value: number;
  sample_size: number;
  low_confidence: number;
  fetched_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS price_quotes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    item_key TEXT NOT NULL,
    item_name TEXT NOT NULL,
    league TEXT NOT NULL,
    game TEXT NOT NULL,
    source_id TEXT NOT NULL,
    chaos_value REAL NOT NULL,
    sample_size INTEGER NOT NULL DEFAULT 0,
    low_confidence INTEGER NOT NULL DEFAULT 0,
    fetched_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_price_quotes_lookup
    ON price_quotes(item_key, league, game, fetched_at);

  CREATE TABLE IF NOT EXISTS price_decisions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    item_key TEXT NOT NULL,
    item_name TEXT NOT NULL,
    league TEXT NOT NULL,
    game TEXT NOT NULL,
    chaos_value REAL NOT NULL,
    confidence TEXT NOT NULL,
    decision_source TEXT NOT NULL,
    quote_count INTEGER NOT NULL,
    decided_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_price_decisions_lookup
    ON price_decisions(item_key, league, game, decided_at);
`;

export class SqliteQuoteStore implements QuoteStore {
  private readonly insertQuote: Database.Statement<[QuoteRecordParams]>;
  private readonly insertDecision: Database.Statement<[DecisionRecordParams]>;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('sqlite-quote-store');
    this.db.exec(SCHEMA);

    this.insertQuote = this.db.prepare<QuoteRecordParams>(`
      INSERT INTO price_quotes
        (item_key, item_name, league, game, source_id, chaos_value, sample_size, low_confidence, fetched_at)
      VALUES
        (@itemKey, @itemName, @league, @game, @sourceId, @chaosValue, @sampleSize, @lowConfidence, @fetchedAt)
    `);
    this.insertDecision = this.db.prepare<DecisionRecordParams>(`
      INSERT INTO price_decisions
        (item_key, item_name, league, game, chaos_value, confidence, decision_source, quote_count, decided_at)
      VALUES
        (@itemKey, @itemName, @league, @game, @chaosValue, @confidence, @decisionSource, @quoteCount, @decidedAt)
    `);
  }

  /**
   * Open (creating if needed) the database file. `:memory:` gives a
   * throwaway store.
   */
  static open(dbPath: string, logger?: Logger): SqliteQuoteStore {
    const log = logger ?? createLogger('sqlite-quote-store');
    const inMemory = dbPath === ':memory:';

    if (!inMemory) {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        log.info({ dir }, 'Created database directory');
      }
    }

    const db = new Database(dbPath);
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
    }
    db.pragma('busy_timeout = 5000');

    log.info({ dbPath }, 'Quote store opened');
    return new SqliteQuoteStore(db, log);
  }

  saveQuote(record: QuoteRecord): void {
    this.insertQuote.run({
      ...record,
      lowConfidence: record.lowConfidence ? 1 : 0,
      fetchedAt: record.fetchedAt.toISOString(),
    });
  }

  saveDecision(record: DecisionRecord): void {
    this.insertDecision.run({ ...record, decidedAt: record.decidedAt.toISOString() });
  }

  loadRecentQuotes(query: QuoteQuery): StoredQuote[] {
    const rows = query.sourceId
      ? this.db
          .prepare<[string, string, string, string, number], QuoteRow>(
            `SELECT * FROM price_quotes
             WHERE item_key = ? AND league = ? AND game = ? AND source_id = ?
             ORDER BY fetched_at DESC, id DESC LIMIT ?`
          )
          .all(query.itemKey, query.league, query.game, query.sourceId, query.limit)
      : this.db
          .prepare<[string, string, string, number], QuoteRow>(
            `SELECT * FROM price_quotes
             WHERE item_key = ? AND league = ? AND game = ?
             ORDER BY fetched_at DESC, id DESC LIMIT ?`
          )
          .all(query.itemKey, query.league, query.game, query.limit);

    return rows.map(row => ({
      id: row.id,
      itemKey: row.item_key,
      itemName: row.item_name,
      league: row.league,
      game: GameSchema.parse(row.game),
      sourceId: row.source_id,
      chaosValue: row.chaos_value,
      sampleSize: row.sample_size,
      lowConfidence: row.low_confidence === 1,
      fetchedAt: new Date(row.fetched_at),
    }));
  }

  countDecisions(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM price_decisions').get();
    return row?.total ?? 0;
  }

  transaction(work: () => void): void {
    this.db.transaction(work)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.info('Quote store closed');
    }
  }
}

type QuoteRecordParams = Omit<QuoteRecord, 'lowConfidence' | 'fetchedAt'> & {
  lowConfidence: number;
  fetchedAt: string;
};

type DecisionRecordParams = Omit<DecisionRecord, 'decidedAt'> & { decidedAt: string };
