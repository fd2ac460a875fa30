/**
 * Schema Introspector
 *
 * Reads table, column, foreign-key and table-level metadata from a Postgres
 * catalog (information_schema + pg_catalog) and assembles one TableSchema
 * per base table.
 *
 * One session is checked out for the whole run and every query goes through
 * it. Any catalog failure is fatal for the run; there are no retries.
 */

import type { Pool } from "pg"
import { PrivacyAnalyzerError, errorMessage } from "./config.js"
import type { Logger } from "./logger.js"
import type {
	ColumnMetadata,
	DatabaseSchema,
	Relationship,
	TableMetadata,
	TablePersistence,
	TableSchema,
} from "./privacy_types.js"

// ============================================================================
// Catalog Session
// ============================================================================

/**
 * The slice of a database connection the introspector needs.
 */
export interface CatalogSession {
	query<R extends Record<string, unknown>>(sql: string, params: unknown[]): Promise<R[]>
	release(): void
}

/**
 * Check out one client from a pg pool and expose it as a CatalogSession.
 */
export async function openPgSession(pool: Pool): Promise<CatalogSession> {
	const client = await pool.connect()
	return {
		query: async <R extends Record<string, unknown>>(sql: string, params: unknown[]) => {
			const result = await client.query<R, unknown[]>(sql, params)
			return result.rows
		},
		release: () => client.release(),
	}
}

// ============================================================================
// Catalog Row Types
// ============================================================================

type TableRow = {
	table_name: string
}

type ColumnRow = {
	column_name: string
	data_type: string
	character_maximum_length: number | null
	is_nullable: string
	column_default: string | null
	is_identity: string | null
	comment: string | null
	is_primary: boolean
	is_unique_constraint: boolean
}

type ForeignKeyRow = {
	constraint_name: string
	column_name: string
	referenced_table: string
	referenced_column: string
}

type TableMetadataRow = {
	comment: string | null
	engine: string | null
	persistence: string
	estimated_rows: number
	last_analyzed_at: Date | null
	last_vacuumed_at: Date | null
}

// ============================================================================
// Queries
// ============================================================================

const TABLES_QUERY = `
	SELECT t.table_name
	FROM information_schema.tables t
	WHERE t.table_schema = $1
		AND t.table_type = 'BASE TABLE'
	ORDER BY t.table_name
`

const COLUMNS_QUERY = `
	WITH key_columns AS (
		SELECT
			tc.constraint_type,
			kcu.column_name
		FROM information_schema.table_constraints tc
		JOIN information_schema.key_column_usage kcu
			ON tc.constraint_name = kcu.constraint_name
			AND tc.table_schema = kcu.table_schema
			AND tc.table_name = kcu.table_name
		WHERE tc.table_schema = $1
			AND tc.table_name = $2
			AND tc.constraint_type IN ('PRIMARY KEY', 'UNIQUE')
	)
	SELECT
		c.column_name,
		c.data_type,
		c.character_maximum_length,
		c.is_nullable,
		c.column_default,
		c.is_identity,
		pg_catalog.col_description(
			(quote_ident(c.table_schema) || '.' || quote_ident(c.table_name))::regclass,
			c.ordinal_position::int
		) AS comment,
		EXISTS (
			SELECT 1 FROM key_columns k
			WHERE k.column_name = c.column_name AND k.constraint_type = 'PRIMARY KEY'
		) AS is_primary,
		EXISTS (
			SELECT 1 FROM key_columns k
			WHERE k.column_name = c.column_name AND k.constraint_type = 'UNIQUE'
		) AS is_unique_constraint
	FROM information_schema.columns c
	WHERE c.table_schema = $1
		AND c.table_name = $2
	ORDER BY c.ordinal_position
`

/**
 * Constraint names are only unique per table, and a composite key spans
 * several columns: pair conkey/confkey by position within one constraint.
 */
const FOREIGN_KEYS_QUERY = `
	SELECT
		con.conname AS constraint_name,
		att.attname AS column_name,
		ref_cls.relname AS referenced_table,
		ref_att.attname AS referenced_column
	FROM pg_catalog.pg_constraint con
	JOIN pg_catalog.pg_class cls ON cls.oid = con.conrelid
	JOIN pg_catalog.pg_namespace nsp ON nsp.oid = cls.relnamespace
	JOIN pg_catalog.pg_class ref_cls ON ref_cls.oid = con.confrelid
	CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, ref_attnum, ord)
	JOIN pg_catalog.pg_attribute att
		ON att.attrelid = con.conrelid
		AND att.attnum = k.attnum
	JOIN pg_catalog.pg_attribute ref_att
		ON ref_att.attrelid = con.confrelid
		AND ref_att.attnum = k.ref_attnum
	WHERE con.contype = 'f'
		AND nsp.nspname = $1
		AND cls.relname = $2
	ORDER BY con.conname, k.ord
`

const TABLE_METADATA_QUERY = `
	SELECT
		pg_catalog.obj_description(c.oid, 'pg_class') AS comment,
		am.amname AS engine,
		c.relpersistence::text AS persistence,
		c.reltuples::float8 AS estimated_rows,
		GREATEST(s.last_analyze, s.last_autoanalyze) AS last_analyzed_at,
		GREATEST(s.last_vacuum, s.last_autovacuum) AS last_vacuumed_at
	FROM pg_catalog.pg_class c
	JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
	LEFT JOIN pg_catalog.pg_am am ON am.oid = c.relam
	LEFT JOIN pg_catalog.pg_stat_user_tables s ON s.relid = c.oid
	WHERE n.nspname = $1
		AND c.relname = $2
		AND c.relkind IN ('r', 'p')
`

const PERSISTENCE: Record<string, TablePersistence> = {
	p: "permanent",
	u: "unlogged",
	t: "temporary",
}

// ============================================================================
// Introspector Class
// ============================================================================

export interface IntrospectorOptions {
	databaseName: string
	/** Schema to introspect (default: 'public') */
	schema?: string
	/** Tables to leave out (e.g., migration bookkeeping) */
	excludeTables?: string[]
}

export class SchemaIntrospector {
	private openSession: () => Promise<CatalogSession>
	private logger: Logger
	private databaseName: string
	private schema: string
	private excludeTables: Set<string>

	constructor(openSession: () => Promise<CatalogSession>, logger: Logger, options: IntrospectorOptions) {
		this.openSession = openSession
		this.logger = logger
		this.databaseName = options.databaseName
		this.schema = options.schema ?? "public"
		this.excludeTables = new Set(options.excludeTables ?? [])
	}

	/**
	 * Introspect every base table of the configured schema
	 */
	async introspect(): Promise<DatabaseSchema> {
		const startTime = Date.now()
		this.logger.info("Starting schema introspection", {
			database: this.databaseName,
			schema: this.schema,
			exclude_tables: [...this.excludeTables],
		})

		let session: CatalogSession
		try {
			session = await this.openSession()
		} catch (error) {
			throw this.catalogError(`Cannot connect to database ${this.databaseName}: ${errorMessage(error)}`, error)
		}

		try {
			const tableNames = await this.getTableNames(session)
			this.logger.debug("Tables found", { count: tableNames.length })

			const tables: TableSchema[] = []
			for (const tableName of tableNames) {
				tables.push({
					table_name: tableName,
					columns: await this.getColumns(session, tableName),
					relationships: await this.getRelationships(session, tableName),
					metadata: await this.getTableMetadata(session, tableName),
				})
			}

			const result: DatabaseSchema = {
				database_name: this.databaseName,
				schema_name: this.schema,
				tables,
				introspected_at: new Date().toISOString(),
			}

			this.logger.info("Schema introspection complete", {
				database: this.databaseName,
				tables: tables.length,
				total_columns: tables.reduce((sum, t) => sum + t.columns.length, 0),
				relationships: tables.reduce((sum, t) => sum + t.relationships.length, 0),
				latency_ms: Date.now() - startTime,
			})

			return result
		} catch (error) {
			if (error instanceof PrivacyAnalyzerError) throw error
			throw this.catalogError(`Catalog query failed: ${errorMessage(error)}`, error)
		} finally {
			session.release()
		}
	}

	private async getTableNames(session: CatalogSession): Promise<string[]> {
		const rows = await session.query<TableRow>(TABLES_QUERY, [this.schema])
		return rows.map((r) => r.table_name).filter((name) => !this.excludeTables.has(name))
	}

	private async getColumns(session: CatalogSession, tableName: string): Promise<ColumnMetadata[]> {
		const rows = await session.query<ColumnRow>(COLUMNS_QUERY, [this.schema, tableName])
		return rows.map((col) => ({
			name: col.column_name,
			data_type: col.data_type,
			max_length: col.character_maximum_length,
			is_nullable: col.is_nullable === "YES",
			default_value: col.column_default,
			is_primary: col.is_primary,
			is_unique: col.is_primary || col.is_unique_constraint,
			auto_increment: col.is_identity === "YES" || /^nextval\(/i.test(col.column_default ?? ""),
			comment: col.comment,
		}))
	}

	private async getRelationships(session: CatalogSession, tableName: string): Promise<Relationship[]> {
		const rows = await session.query<ForeignKeyRow>(FOREIGN_KEYS_QUERY, [this.schema, tableName])
		return rows.map((fk) => ({
			constraint_name: fk.constraint_name,
			column_name: fk.column_name,
			referenced_table: fk.referenced_table,
			referenced_column: fk.referenced_column,
		}))
	}

	private async getTableMetadata(session: CatalogSession, tableName: string): Promise<TableMetadata> {
		const rows = await session.query<TableMetadataRow>(TABLE_METADATA_QUERY, [this.schema, tableName])
		const row = rows[0]
		if (!row) {
			throw this.catalogError(`Table ${this.schema}.${tableName} disappeared during introspection`)
		}
		return {
			comment: row.comment,
			engine: row.engine,
			persistence: PERSISTENCE[row.persistence] ?? "permanent",
			estimated_rows: Number(row.estimated_rows),
			last_analyzed_at: row.last_analyzed_at,
			last_vacuumed_at: row.last_vacuumed_at,
		}
	}

	private catalogError(message: string, cause?: unknown): PrivacyAnalyzerError {
		this.logger.error(message)
		return new PrivacyAnalyzerError("catalog", message, false, {
			database: this.databaseName,
			schema: this.schema,
			...(cause === undefined ? {} : { originalError: errorMessage(cause) }),
		})
	}
}
