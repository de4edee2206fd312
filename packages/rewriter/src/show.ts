// packages/rewriter/src/show.ts
// SHOW statements and account views, answered from DuckDB's system information_schema.
import { Errors, type ExtensionNames, type Identifier } from '@frostbridge/core';
import { parseQuery, parseStatement, quoteString, type Query, type Statement } from '@frostbridge/sql';
import type { SessionContext } from '@frostbridge/session';

type ShowStatement = Extract<Statement, { kind: 'show' }>;

/** DuckDB does not track creation times; every object reports the epoch. */
const CREATED = "CAST('1970-01-01 00:00:00+00:00' AS TIMESTAMP_TZ)";

const list = (names: string[]): string => names.map(quoteString).join(', ');

const hiddenCatalogs = (ext: ExtensionNames): string => list(['memory', 'system', 'temp', ext.catalog]);

function currentDatabase(session: SessionContext, ref: string): string {
  const db = session.database;
  if (db === undefined) throw Errors.NO_CONTEXT(ref, 'database');
  return db;
}

function showDatabases(session: SessionContext, ext: ExtensionNames): string {
  const db = session.database;
  const current = db === undefined ? "'N'" : `CASE WHEN catalog_name = ${quoteString(db)} THEN 'Y' ELSE 'N' END`;
  return (
    `SELECT ${CREATED} AS "created_on", catalog_name AS "name", 'N' AS "is_default", ${current} AS "is_current", ` +
    `'' AS "origin", 'SYSADMIN' AS "owner", NULL AS "comment", '' AS "options", 1 AS "retention_time", 'STANDARD' AS "kind" ` +
    `FROM system.information_schema.schemata WHERE catalog_name NOT IN (${hiddenCatalogs(ext)}) AND schema_name = 'main' ` +
    'ORDER BY catalog_name'
  );
}

function showSchemas(s: ShowStatement, session: SessionContext, ext: ExtensionNames): string {
  const scope = s.scope?.map((p) => session.foldIdentifier(p));
  const db = scope ? scope[scope.length - 1].name : currentDatabase(session, 'SHOW SCHEMAS');
  const current =
    db === session.database && session.schema !== undefined
      ? `CASE WHEN schema_name = ${quoteString(session.schema)} THEN 'Y' ELSE 'N' END`
      : "'N'";
  return (
    `SELECT ${CREATED} AS "created_on", schema_name AS "name", 'N' AS "is_default", ${current} AS "is_current", ` +
    `catalog_name AS "database_name", 'SYSADMIN' AS "owner", NULL AS "comment", '' AS "options", 1 AS "retention_time", ` +
    `'ROLE' AS "owner_role_type" FROM system.information_schema.schemata WHERE catalog_name = ${quoteString(db)} ` +
    `AND schema_name NOT IN (${list(['pg_catalog', ext.schema])}) ORDER BY schema_name`
  );
}

function objectScope(s: ShowStatement, session: SessionContext): { database: string; schema: string } {
  const scope: Identifier[] = (s.scope ?? []).map((p) => session.foldIdentifier(p));
  if (scope.length >= 2) return { database: scope[scope.length - 2].name, schema: scope[scope.length - 1].name };
  const database = currentDatabase(session, 'SHOW OBJECTS');
  if (scope.length === 1) return { database, schema: scope[0].name };
  const schema = session.schema;
  if (schema === undefined) throw Errors.NO_CONTEXT('SHOW OBJECTS', 'schema');
  return { database, schema };
}

function showObjects(s: ShowStatement, session: SessionContext): string {
  const { database, schema } = objectScope(s, session);
  return (
    `SELECT ${CREATED} AS "created_on", table_name AS "name", table_schema AS "schema_name", ` +
    `table_catalog AS "database_name", CASE WHEN table_type = 'VIEW' THEN 'VIEW' ELSE 'TABLE' END AS "kind", ` +
    `NULL AS "comment", 'SYSADMIN' AS "owner", 'ROLE' AS "owner_role_type" FROM system.information_schema.tables ` +
    `WHERE table_catalog = ${quoteString(database)} AND table_schema = ${quoteString(schema)} ORDER BY table_name`
  );
}

export function showQuery(s: ShowStatement, session: SessionContext, ext: ExtensionNames): Statement {
  switch (s.object) {
    case 'DATABASES':
      return parseStatement(showDatabases(session, ext));
    case 'SCHEMAS':
      return parseStatement(showSchemas(s, session, ext));
    case 'OBJECTS':
      return parseStatement(showObjects(s, session));
  }
}

/** Rows of INFORMATION_SCHEMA.DATABASES, one per attached user database. */
export function databasesView(ext: ExtensionNames): Query {
  return parseQuery(
    'SELECT catalog_name AS database_name, \'SYSADMIN\' AS database_owner, \'NO\' AS is_transient, ' +
      `CAST(NULL AS VARCHAR) AS comment, ${CREATED} AS created, ${CREATED} AS last_altered, ` +
      "1 AS retention_time, 'STANDARD' AS type FROM system.information_schema.schemata " +
      `WHERE catalog_name NOT IN (${hiddenCatalogs(ext)}) AND schema_name = 'main'`
  );
}
