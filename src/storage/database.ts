import Database from 'better-sqlite3';
import type { Article, GraphEdge, GraphNode, GraphTables, Journal, Publication, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * One table per interned entity kind that a run exports, plus the graph projection.
 */
const MIGRATION_V1 = `
-- Runs: harvest session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  prepubgraph_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  server TEXT NOT NULL,
  interval TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Articles: one row per preprint revision
CREATE TABLE IF NOT EXISTS articles (
  doi TEXT NOT NULL,
  version INTEGER NOT NULL,
  title TEXT NOT NULL,
  authors TEXT NOT NULL,
  num_authors INTEGER NOT NULL,
  corr_authors TEXT NOT NULL,
  institution TEXT NOT NULL,
  date TEXT,
  type TEXT NOT NULL,
  category_json TEXT NOT NULL DEFAULT '[]',
  xml TEXT NOT NULL,
  pub_doi TEXT NOT NULL,
  publication_link TEXT,
  PRIMARY KEY (doi, version)
);

-- Journals, keyed by title
CREATE TABLE IF NOT EXISTS journals (
  title TEXT PRIMARY KEY,
  prefix TEXT,
  issn TEXT,
  impact_factor REAL NOT NULL DEFAULT 0.0
);

-- Publications: a preprint revision that appeared in a journal
CREATE TABLE IF NOT EXISTS publications (
  pub_doi TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  journal_title TEXT NOT NULL REFERENCES journals(title),
  article_doi TEXT NOT NULL,
  article_version INTEGER NOT NULL
);

-- Publications still missing their initial preprint version
CREATE TABLE IF NOT EXISTS missing_versions (
  pub_doi TEXT PRIMARY KEY,
  doi TEXT NOT NULL
);

-- Cross-reference graph
CREATE TABLE IF NOT EXISTS graph_nodes (
  id TEXT NOT NULL,
  kind TEXT NOT NULL,
  name TEXT NOT NULL,
  PRIMARY KEY (id, kind)
);

CREATE TABLE IF NOT EXISTS graph_edges (
  edge_id INTEGER PRIMARY KEY,
  src TEXT NOT NULL,
  src_kind TEXT NOT NULL,
  dst TEXT NOT NULL,
  dst_kind TEXT NOT NULL,
  relationship TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_articles_pub_doi ON articles(pub_doi);
CREATE INDEX IF NOT EXISTS idx_graph_edges_src ON graph_edges(src);
CREATE INDEX IF NOT EXISTS idx_graph_edges_relationship ON graph_edges(relationship);
`;

// ─── Row shapes ───────────────────────────────────────────

export interface ArticleRow {
    doi: string;
    version: number;
    title: string;
    authors: string;
    num_authors: number;
    corr_authors: string;
    institution: string;
    date: string | null;
    type: string;
    category_json: string;
    xml: string;
    pub_doi: string;
    publication_link: string | null;
}

export interface JournalRow {
    title: string;
    prefix: string | null;
    issn: string | null;
    impact_factor: number;
}

export interface PublicationRow {
    pub_doi: string;
    name: string;
    journal_title: string;
    article_doi: string;
    article_version: number;
}

export interface MissingVersionRow {
    pub_doi: string;
    doi: string;
}

interface EdgeRow {
    src: string;
    src_kind: string;
    dst: string;
    dst_kind: string;
    relationship: string;
}

export interface SnapshotStats {
    articles: number;
    revisions: number;
    journals: number;
    publications: number;
    missingVersions: number;
    nodes: number;
    edges: number;
    runs: number;
    edgesByRelationship: Record<string, number>;
}

/**
 * `YYYY-MM-DD`, or null for the not-a-time sentinel.
 */
export function formatDate(date: Date | null): string | null {
    return date ? date.toISOString().slice(0, 10) : null;
}

export function toArticleRow(article: Article): ArticleRow {
    return {
        doi: article.doi,
        version: article.version,
        title: article.title,
        authors: article.authors,
        num_authors: article.numAuthors,
        corr_authors: article.corrAuthors,
        institution: article.institution,
        date: formatDate(article.date),
        type: article.type,
        category_json: JSON.stringify(article.category),
        xml: article.xml,
        pub_doi: article.pubDoi,
        publication_link: article.publicationLink,
    };
}

/**
 * Snapshot database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and bulk writes of a finished run.
 */
export class HarvestDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger('storage').debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger('storage').info('Database migrated to v1');
        }
    }

    // ─── Articles ─────────────────────────────────────────────

    /**
     * Insert article revisions in one transaction.
     * A repeated (doi, version) keeps the row written first.
     * @returns number of rows written
     */
    insertArticles(articles: readonly Article[]): number {
        const stmt = this.db.prepare<ArticleRow>(`
      INSERT OR IGNORE INTO articles (doi, version, title, authors, num_authors, corr_authors, institution, date, type, category_json, xml, pub_doi, publication_link)
      VALUES (@doi, @version, @title, @authors, @num_authors, @corr_authors, @institution, @date, @type, @category_json, @xml, @pub_doi, @publication_link)
    `);

        let written = 0;
        this.transaction(() => {
            for (const article of articles) {
                written += stmt.run(toArticleRow(article)).changes;
            }
        });
        return written;
    }

    getAllArticles(): ArticleRow[] {
        return this.db.prepare<[], ArticleRow>('SELECT * FROM articles ORDER BY doi, version').all();
    }

    getArticleVersions(doi: string): ArticleRow[] {
        return this.db.prepare<[string], ArticleRow>('SELECT * FROM articles WHERE doi = ? ORDER BY version').all(doi);
    }

    // ─── Journals & publications ──────────────────────────────

    insertJournals(journals: readonly Journal[]): void {
        const stmt = this.db.prepare<JournalRow>(`
      INSERT OR IGNORE INTO journals (title, prefix, issn, impact_factor)
      VALUES (@title, @prefix, @issn, @impact_factor)
    `);

        this.transaction(() => {
            for (const journal of journals) {
                stmt.run({
                    title: journal.title,
                    prefix: journal.prefix,
                    issn: journal.issn,
                    impact_factor: journal.impactFactor,
                });
            }
        });
    }

    insertPublications(publications: readonly Publication[]): void {
        const stmt = this.db.prepare<PublicationRow>(`
      INSERT OR IGNORE INTO publications (pub_doi, name, journal_title, article_doi, article_version)
      VALUES (@pub_doi, @name, @journal_title, @article_doi, @article_version)
    `);

        this.transaction(() => {
            for (const publication of publications) {
                stmt.run({
                    pub_doi: publication.pubDoi,
                    name: publication.name,
                    journal_title: publication.journal.title,
                    article_doi: publication.article.doi,
                    article_version: publication.article.version,
                });
            }
        });
    }

    getAllJournals(): JournalRow[] {
        return this.db.prepare<[], JournalRow>('SELECT * FROM journals ORDER BY title').all();
    }

    getAllPublications(): PublicationRow[] {
        return this.db.prepare<[], PublicationRow>('SELECT * FROM publications ORDER BY pub_doi').all();
    }

    // ─── Missing initial versions ─────────────────────────────

    insertMissingVersions(rows: readonly MissingVersionRow[]): void {
        const stmt = this.db.prepare<MissingVersionRow>(
            'INSERT OR REPLACE INTO missing_versions (pub_doi, doi) VALUES (@pub_doi, @doi)'
        );
        this.transaction(() => {
            for (const row of rows) stmt.run(row);
        });
    }

    getMissingVersions(): MissingVersionRow[] {
        return this.db.prepare<[], MissingVersionRow>('SELECT * FROM missing_versions ORDER BY pub_doi').all();
    }

    // ─── Graph ────────────────────────────────────────────────

    /**
     * Drop the graph and missing-version rows of an earlier run. These tables
     * describe the latest run only; articles, journals and publications accumulate.
     */
    clearRunTables(): void {
        this.transaction(() => {
            this.db.exec('DELETE FROM graph_edges; DELETE FROM graph_nodes; DELETE FROM missing_versions;');
        });
    }

    insertGraph(graph: GraphTables): void {
        const nodeStmt = this.db.prepare<GraphNode>(
            'INSERT OR IGNORE INTO graph_nodes (id, kind, name) VALUES (@id, @kind, @name)'
        );
        const edgeStmt = this.db.prepare<EdgeRow>(`
      INSERT INTO graph_edges (src, src_kind, dst, dst_kind, relationship)
      VALUES (@src, @src_kind, @dst, @dst_kind, @relationship)
    `);

        this.transaction(() => {
            for (const node of graph.nodes) nodeStmt.run(node);
            for (const edge of graph.edges) {
                edgeStmt.run({
                    src: edge.src,
                    src_kind: edge.srcKind,
                    dst: edge.dst,
                    dst_kind: edge.dstKind,
                    relationship: edge.relationship,
                });
            }
        });
    }

    getGraph(): GraphTables {
        const nodes = this.db.prepare<[], GraphNode>('SELECT id, kind, name FROM graph_nodes ORDER BY kind, id').all();
        const edges = this.db
            .prepare<[], EdgeRow>('SELECT src, src_kind, dst, dst_kind, relationship FROM graph_edges ORDER BY edge_id')
            .all()
            .map((row): GraphEdge => ({
                src: row.src,
                srcKind: row.src_kind,
                dst: row.dst,
                dstKind: row.dst_kind,
                relationship: row.relationship,
            }));
        return { nodes, edges };
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, prepubgraph_version, config_json, server, interval, stats_json)
      VALUES (@created_at, @prepubgraph_version, @config_json, @server, @interval, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): SnapshotStats {
        const count = (sql: string): number => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

        const relationshipRows = this.db
            .prepare<[], { relationship: string; count: number }>(
                'SELECT relationship, COUNT(*) as count FROM graph_edges GROUP BY relationship ORDER BY relationship'
            )
            .all();
        const edgesByRelationship: Record<string, number> = {};
        for (const row of relationshipRows) {
            edgesByRelationship[row.relationship] = row.count;
        }

        return {
            articles: count('SELECT COUNT(DISTINCT doi) as count FROM articles'),
            revisions: count('SELECT COUNT(*) as count FROM articles'),
            journals: count('SELECT COUNT(*) as count FROM journals'),
            publications: count('SELECT COUNT(*) as count FROM publications'),
            missingVersions: count('SELECT COUNT(*) as count FROM missing_versions'),
            nodes: count('SELECT COUNT(*) as count FROM graph_nodes'),
            edges: count('SELECT COUNT(*) as count FROM graph_edges'),
            runs: count('SELECT COUNT(*) as count FROM runs'),
            edgesByRelationship,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
        getLogger('storage').debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
