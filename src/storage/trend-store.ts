import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import sqlite3 from 'sqlite3';

import { trendAnalysisPayloadSchema } from '../analysis/schemas';
import type { TrendAnalysis } from '../analysis/schemas';
import { normalizeContentGap } from '../extraction/records';
import type { TrendRecord } from '../extraction/types';
import { describeError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { keywordKey } from '../utils/text';
import type { TrendAnalysisRow, TrendRow, UpsertSummary } from './types';

const OPEN_FLAGS = sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
const IN_MEMORY = ':memory:';

function toJson(value: unknown): string | null {
  if (value === undefined) {
    return null;
  }

  try {
    return JSON.stringify(value);
  } catch (error) {
    return JSON.stringify({ fallback: String(value), serializationError: true });
  }
}

function parseJson(value: string | null | undefined): unknown {
  if (!value) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    return undefined;
  }
}

function rowToTrend(row: TrendRow): TrendRecord {
  return {
    keyword: row.keyword,
    searchVolume: row.search_volume ?? '',
    growthPercentage: row.growth_percentage ?? '',
    contentGapIndicator: normalizeContentGap(row.content_gap_indicator ?? undefined),
    category: row.category ?? '',
    trendDescription: row.trend_description ?? '',
    userContext: row.user_context ?? '',
    confidence: row.confidence,
    potential: row.potential ?? '',
    recommendedActions: row.recommended_actions ?? '',
    dateExtracted: row.date_extracted,
    sourceIdentifier: row.source_identifier,
    rawResponse: row.raw_response ?? ''
  };
}

function rowToAnalysis(row: TrendAnalysisRow): TrendAnalysis {
  const payload = trendAnalysisPayloadSchema.safeParse(parseJson(row.payload) ?? {});
  return {
    keyword: row.keyword,
    marketSize: payload.success ? payload.data.market_analysis.market_size ?? 'Unknown' : 'Unknown',
    growthTrajectory: payload.success ? payload.data.market_analysis.growth_trajectory ?? 'Unknown' : 'Unknown',
    opportunities: payload.success ? payload.data.business_opportunities : [],
    recommendedAction: row.recommended_action,
    overallScore: row.overall_score,
    generated: row.generated === 1,
    payload: payload.success ? payload.data : {}
  };
}

export class TrendStore {
  private constructor(private readonly db: sqlite3.Database, private readonly logger: Logger) {}

  static async initialize(dbFile: string, logger: Logger): Promise<TrendStore> {
    let location = IN_MEMORY;
    if (dbFile !== IN_MEMORY) {
      location = resolve(process.cwd(), dbFile);
      mkdirSync(dirname(location), { recursive: true });
    }

    const database = await new Promise<sqlite3.Database>((resolveDb, rejectDb) => {
      const db = new sqlite3.Database(location, OPEN_FLAGS, (err) => {
        if (err) {
          rejectDb(err);
          return;
        }
        resolveDb(db);
      });
    });

    const store = new TrendStore(database, logger);
    await store.bootstrap();
    return store;
  }

  private exec(sql: string): Promise<void> {
    return new Promise((resolveExec, rejectExec) => {
      this.db.exec(sql, (err) => {
        if (err) {
          rejectExec(err);
          return;
        }
        resolveExec();
      });
    });
  }

  private run(sql: string, params: unknown[]): Promise<number> {
    return new Promise((resolveRun, rejectRun) => {
      this.db.run(sql, params, function runCallback(err) {
        if (err) {
          rejectRun(err);
          return;
        }
        resolveRun(this.changes ?? 0);
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolveAll, rejectAll) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) {
          rejectAll(err);
          return;
        }
        resolveAll(rows as T[]);
      });
    });
  }

  private async bootstrap(): Promise<void> {
    await this.exec(`
      CREATE TABLE IF NOT EXISTS trends (
        keyword_key TEXT PRIMARY KEY,
        keyword TEXT NOT NULL CHECK (length(trim(keyword)) > 0),
        search_volume TEXT,
        growth_percentage TEXT,
        content_gap_indicator TEXT,
        category TEXT,
        trend_description TEXT,
        user_context TEXT,
        confidence REAL NOT NULL,
        potential TEXT,
        recommended_actions TEXT,
        date_extracted TEXT NOT NULL,
        source_identifier TEXT NOT NULL,
        raw_response TEXT,
        updated_ts INTEGER NOT NULL
      )
    `);

    await this.exec(`
      CREATE TABLE IF NOT EXISTS trend_analyses (
        keyword_key TEXT PRIMARY KEY,
        keyword TEXT NOT NULL,
        opportunity_type TEXT,
        revenue_potential TEXT,
        launch_timeline TEXT,
        success_probability TEXT,
        overall_score REAL,
        recommended_action TEXT NOT NULL,
        generated INTEGER NOT NULL,
        payload TEXT,
        created_ts INTEGER NOT NULL
      )
    `);

    await this.exec('CREATE INDEX IF NOT EXISTS idx_trends_confidence ON trends(confidence)');
    await this.exec('CREATE INDEX IF NOT EXISTS idx_trends_date ON trends(date_extracted)');
  }

  /**
   * Replace-on-conflict by lower-cased keyword. A record that fails to
   * insert is logged and counted; the remaining records are still written.
   */
  async upsertTrends(records: TrendRecord[]): Promise<UpsertSummary> {
    if (records.length === 0) {
      return { saved: 0, failed: 0 };
    }

    const timestamp = Date.now();
    let saved = 0;
    let failed = 0;

    await this.exec('BEGIN');
    try {
      for (const record of records) {
        try {
          await this.run(
            `INSERT OR REPLACE INTO trends (
               keyword_key, keyword, search_volume, growth_percentage, content_gap_indicator, category,
               trend_description, user_context, confidence, potential, recommended_actions, date_extracted,
               source_identifier, raw_response, updated_ts
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              keywordKey(record.keyword),
              record.keyword,
              record.searchVolume,
              record.growthPercentage,
              record.contentGapIndicator,
              record.category,
              record.trendDescription,
              record.userContext,
              record.confidence,
              record.potential,
              record.recommendedActions,
              record.dateExtracted,
              record.sourceIdentifier,
              record.rawResponse,
              timestamp
            ]
          );
          saved += 1;
        } catch (error) {
          failed += 1;
          this.logger.warn('Failed to save trend', {
            keyword: record.keyword,
            error: describeError(error)
          });
        }
      }
      await this.exec('COMMIT');
    } catch (error) {
      await this.exec('ROLLBACK');
      throw error;
    }

    this.logger.info('Trends saved', { saved, failed });
    return { saved, failed };
  }

  async getTrends(): Promise<TrendRecord[]> {
    const rows = await this.all<TrendRow>(
      `SELECT keyword_key, keyword, search_volume, growth_percentage, content_gap_indicator, category,
              trend_description, user_context, confidence, potential, recommended_actions, date_extracted,
              source_identifier, raw_response, updated_ts
         FROM trends
        ORDER BY updated_ts ASC, rowid ASC`
    );
    return rows.map(rowToTrend);
  }

  async getTopTrends(limit: number): Promise<TrendRecord[]> {
    const rows = await this.all<TrendRow>(
      `SELECT keyword_key, keyword, search_volume, growth_percentage, content_gap_indicator, category,
              trend_description, user_context, confidence, potential, recommended_actions, date_extracted,
              source_identifier, raw_response, updated_ts
         FROM trends
        ORDER BY confidence DESC, CAST(potential AS REAL) DESC, keyword_key ASC
        LIMIT ?`,
      [limit]
    );
    return rows.map(rowToTrend);
  }

  async countTrends(): Promise<number> {
    const rows = await this.all<{ total: number }>('SELECT COUNT(*) AS total FROM trends');
    return rows[0]?.total ?? 0;
  }

  async saveAnalyses(analyses: TrendAnalysis[]): Promise<void> {
    if (analyses.length === 0) {
      return;
    }

    const timestamp = Date.now();

    await this.exec('BEGIN');
    try {
      for (const analysis of analyses) {
        const top = analysis.opportunities[0];
        await this.run(
          `INSERT INTO trend_analyses (
             keyword_key, keyword, opportunity_type, revenue_potential, launch_timeline, success_probability,
             overall_score, recommended_action, generated, payload, created_ts
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(keyword_key) DO UPDATE SET
             keyword=excluded.keyword,
             opportunity_type=excluded.opportunity_type,
             revenue_potential=excluded.revenue_potential,
             launch_timeline=excluded.launch_timeline,
             success_probability=excluded.success_probability,
             overall_score=excluded.overall_score,
             recommended_action=excluded.recommended_action,
             generated=excluded.generated,
             payload=excluded.payload,
             created_ts=excluded.created_ts`,
          [
            keywordKey(analysis.keyword),
            analysis.keyword,
            top?.type ?? null,
            top?.revenue_potential ?? null,
            top?.time_to_launch ?? null,
            top?.success_probability ?? null,
            analysis.overallScore,
            analysis.recommendedAction,
            analysis.generated ? 1 : 0,
            toJson(analysis.payload),
            timestamp
          ]
        );
      }
      await this.exec('COMMIT');
    } catch (error) {
      await this.exec('ROLLBACK');
      throw error;
    }
  }

  /** Stored analyses keyed by lower-cased keyword. */
  async getAnalyses(): Promise<Map<string, TrendAnalysis>> {
    const rows = await this.all<TrendAnalysisRow>(
      `SELECT keyword_key, keyword, opportunity_type, revenue_potential, launch_timeline, success_probability,
              overall_score, recommended_action, generated, payload, created_ts
         FROM trend_analyses`
    );
    return new Map(rows.map((row) => [row.keyword_key, rowToAnalysis(row)]));
  }

  async close(): Promise<void> {
    await new Promise<void>((resolveClose, rejectClose) => {
      this.db.close((err) => {
        if (err) {
          rejectClose(err);
          return;
        }
        resolveClose();
      });
    });
  }
}
