import Database from 'better-sqlite3';
import { z } from 'zod';
import { bigintReplacer, env, logger, type TokenAnalysis } from '@token-risk/core';

const storedRowSchema = z.object({
  requestId: z.string(),
  address: z.string(),
  finalScore: z.number(),
  grade: z.string(),
  riskLevel: z.string(),
  isHoneypot: z.number(),
  analyzedAt: z.string(),
  payload: z.string()
});

export type StoredAnalysis = {
  requestId: string;
  address: string;
  finalScore: number;
  grade: string;
  riskLevel: string;
  isHoneypot: boolean;
  analyzedAt: string;
  // TokenAnalysis as JSON, bigints written as decimal strings
  payload: unknown;
};

function toStored(row: unknown): StoredAnalysis {
  const r = storedRowSchema.parse(row);
  return { ...r, isHoneypot: r.isHoneypot === 1, payload: JSON.parse(r.payload) };
}

export class AnalysisStore {
  private db: Database.Database;

  constructor(path: string = env.SQLITE_PATH) {
    this.db = new Database(path);
    this.bootstrap();
  }

  private bootstrap() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS analyses(
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        requestId TEXT UNIQUE NOT NULL,
        address TEXT NOT NULL,
        finalScore REAL NOT NULL,
        grade TEXT NOT NULL,
        riskLevel TEXT NOT NULL,
        isHoneypot INTEGER NOT NULL,
        analyzedAt TEXT NOT NULL,
        payload TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS analyses_address ON analyses(address);
    `);

    logger.info('storage ready');
  }

  saveAnalysis(analysis: TokenAnalysis) {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO analyses(requestId, address, finalScore, grade, riskLevel, isHoneypot, analyzedAt, payload)
         VALUES (@requestId, @address, @finalScore, @grade, @riskLevel, @isHoneypot, @analyzedAt, @payload)`
      )
      .run({
        requestId: analysis.requestId,
        address: analysis.address.toLowerCase(),
        finalScore: analysis.breakdown.finalScore,
        grade: analysis.breakdown.grade,
        riskLevel: analysis.breakdown.riskLevel,
        isHoneypot: analysis.honeypot.isHoneypot ? 1 : 0,
        analyzedAt: analysis.analyzedAt,
        payload: JSON.stringify(analysis, bigintReplacer)
      });
  }

  latestAnalysis(address: string): StoredAnalysis | undefined {
    const row = this.db
      .prepare(`SELECT * FROM analyses WHERE address = ? ORDER BY seq DESC LIMIT 1`)
      .get(address.toLowerCase());
    return row === undefined ? undefined : toStored(row);
  }

  listRecent(limit = 20): StoredAnalysis[] {
    return this.db.prepare(`SELECT * FROM analyses ORDER BY seq DESC LIMIT ?`).all(limit).map(toStored);
  }

  close() {
    this.db.close();
  }
}
