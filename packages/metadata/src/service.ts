// packages/metadata/src/service.ts
import { Errors, createLogger, type Logger, type NativeColumn, type QualifiedName } from '@frostbridge/core';
import type { Translation, Translator } from '@frostbridge/rewriter';
import type { SessionContext } from '@frostbridge/session';
import { describeTable, parseDescribeRows, shape, type DescribeRow, type SourceColumnMetadata } from '@frostbridge/shaper';
import { parseScript } from '@frostbridge/sql';
import type { TargetEngine } from './engine';
import type { ColumnExtensionStore } from './store';

export interface StatementOutcome {
  translation: Translation;
  columns: SourceColumnMetadata[];
  rows: Record<string, unknown>[];
}

export interface DescribeOutcome {
  table: QualifiedName;
  rows: DescribeRow[];
}

/**
 * Runs translated statements against the engine and keeps the extension store in
 * step with them. Engine errors propagate unchanged; a statement that fails leaves
 * neither the session nor the store touched.
 */
export class MetadataService {
  private readonly log: Logger;

  constructor(
    private readonly engine: TargetEngine,
    private readonly store: ColumnExtensionStore,
    private readonly translator: Translator,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('metadata');
  }

  async describe(session: SessionContext, table: string): Promise<DescribeOutcome> {
    const t = this.translator.translate(`DESCRIBE TABLE ${table}`, session);
    return this.describeTranslated(t);
  }

  private async describeTranslated(t: Translation): Promise<DescribeOutcome> {
    if (!t.describe) throw Errors.SYNTAX('not a DESCRIBE statement');
    const result = await this.engine.execute(t.emittedSql);
    const lengths = await this.store.lengths(t.describe);
    return { table: t.describe, rows: describeTable(parseDescribeRows(result.rows), lengths) };
  }

  /** Translates, executes and applies each statement of a script in order. */
  async run(sql: string, session: SessionContext): Promise<StatementOutcome[]> {
    const out: StatementOutcome[] = [];
    for (const { text } of parseScript(sql)) {
      const translation = this.translator.translate(text, session);
      out.push(await this.execute(translation, session));
    }
    return out;
  }

  private async execute(translation: Translation, session: SessionContext): Promise<StatementOutcome> {
    if (translation.describe) {
      const described = await this.describeTranslated(translation);
      this.commit(translation, session);
      return { translation, columns: [], rows: described.rows };
    }
    const result = await this.engine.execute(translation.emittedSql);
    await this.store.record(translation.metadataEffects);
    this.commit(translation, session);
    this.log.debug({ kind: translation.statementKind, rows: result.rows.length }, 'executed');
    const lengths = await this.lengthsFor(result.columns, session);
    return { translation, columns: shape(result.columns, session, lengths), rows: result.rows };
  }

  /** Stored lengths apply when every result column comes from the same table. */
  private async lengthsFor(columns: readonly NativeColumn[], session: SessionContext): Promise<Map<string, number>> {
    const tables = new Set(
      columns.map((c) => JSON.stringify([c.database ?? session.database, c.schema ?? session.schema, c.table]))
    );
    const [first] = columns;
    if (tables.size !== 1 || !first?.table) return new Map();
    const database = first.database ?? session.database;
    const schema = first.schema ?? session.schema;
    if (database === undefined || schema === undefined) return new Map();
    return this.store.lengths({ database, schema, name: first.table });
  }

  private commit(translation: Translation, session: SessionContext): void {
    if (translation.mutatedSession) session.applyDelta(translation.mutatedSession);
  }
}
