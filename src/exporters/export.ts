import { writeFileSync } from 'node:fs';
import { HarvestDatabase, type ArticleRow, type JournalRow, type PublicationRow } from '../storage/database.js';
import type { GraphTables } from '../types/index.js';
import { InvalidRequestError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'csv', 'graphml'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    csv: '.csv',
    graphml: '.graphml',
};

export interface ExportData {
    articles: ArticleRow[];
    journals: JournalRow[];
    publications: PublicationRow[];
    graph: GraphTables;
}

export function parseExportFormat(value: string): ExportFormat {
    const normalized = value.trim().toLowerCase();
    const format = EXPORT_FORMATS.find((f) => f === normalized);
    if (!format) {
        throw new InvalidRequestError(`Invalid format: ${value}. Valid: ${EXPORT_FORMATS.join(', ')}`);
    }
    return format;
}

// ─── Main Export Function ────────────────────────────────

export function readExportData(db: HarvestDatabase): ExportData {
    return {
        articles: db.getAllArticles(),
        journals: db.getAllJournals(),
        publications: db.getAllPublications(),
        graph: db.getGraph(),
    };
}

export function renderExport(data: ExportData, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(data);
        case 'csv':
            return exportCSV(data);
        case 'graphml':
            return exportGraphML(data.graph);
    }
}

/**
 * Export a snapshot database to a file in the given format.
 */
export function exportSnapshot(dbPath: string, outputPath: string, format: ExportFormat): void {
    const db = new HarvestDatabase(dbPath);

    try {
        const data = readExportData(db);
        writeFileSync(outputPath, renderExport(data, format), 'utf-8');
        getLogger('export').info(
            { format, outputPath, nodes: data.graph.nodes.length, edges: data.graph.edges.length },
            'Snapshot exported'
        );
    } finally {
        db.close();
    }
}

// ─── Format Implementations ─────────────────────────────

function parseCategories(json: string): string[] {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function exportJson(data: ExportData): string {
    return JSON.stringify({
        prepubgraph: {
            version: VERSION,
            exported_at: new Date().toISOString(),
        },
        articles: data.articles.map((a) => ({
            doi: a.doi,
            version: a.version,
            title: a.title,
            authors: a.authors,
            num_authors: a.num_authors,
            institution: a.institution,
            date: a.date,
            type: a.type,
            category: parseCategories(a.category_json),
            published: a.pub_doi,
            publication_link: a.publication_link,
        })),
        journals: data.journals,
        publications: data.publications,
        nodes: data.graph.nodes,
        edges: data.graph.edges.map((e) => ({
            source: e.src,
            source_kind: e.srcKind,
            target: e.dst,
            target_kind: e.dstKind,
            relationship: e.relationship,
        })),
    }, null, 2);
}

/**
 * Quote a CSV field when it holds a delimiter, quote or line break.
 */
export function csvField(value: string | number | null): string {
    if (value === null) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function exportCSV(data: ExportData): string {
    const line = (fields: Array<string | number | null>) => fields.map(csvField).join(',') + '\n';

    let csv = line(['id', 'kind', 'name']);
    for (const node of data.graph.nodes) {
        csv += line([node.id, node.kind, node.name]);
    }

    csv += '\n# EDGES\n' + line(['src', 'src_kind', 'dst', 'dst_kind', 'relationship']);
    for (const edge of data.graph.edges) {
        csv += line([edge.src, edge.srcKind, edge.dst, edge.dstKind, edge.relationship]);
    }

    csv += '\n# ARTICLES\n' + line(['doi', 'version', 'title', 'date', 'institution', 'published']);
    for (const article of data.articles) {
        csv += line([article.doi, article.version, article.title, article.date, article.institution, article.pub_doi]);
    }

    return csv;
}

function exportGraphML(graph: GraphTables): string {
    const esc = (s: string) =>
        s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

    // Ids are only unique per kind, so GraphML ids are positional
    const ids = new Map<string, string>();
    graph.nodes.forEach((node, index) => ids.set(`${node.kind}\u0000${node.id}`, `n${index}`));

    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="label" for="node" attr.name="label" attr.type="string"/>
  <key id="kind" for="node" attr.name="kind" attr.type="string"/>
  <key id="name" for="node" attr.name="name" attr.type="string"/>
  <key id="relationship" for="edge" attr.name="relationship" attr.type="string"/>
  <graph id="prepubgraph" edgedefault="directed">
`;

    graph.nodes.forEach((node, index) => {
        xml += `    <node id="n${index}">
      <data key="label">${esc(node.id)}</data>
      <data key="kind">${esc(node.kind)}</data>
      <data key="name">${esc(node.name)}</data>
    </node>
`;
    });

    let skipped = 0;
    for (const edge of graph.edges) {
        const source = ids.get(`${edge.srcKind}\u0000${edge.src}`);
        const target = ids.get(`${edge.dstKind}\u0000${edge.dst}`);
        if (!source || !target) {
            skipped++;
            continue;
        }
        xml += `    <edge source="${source}" target="${target}">
      <data key="relationship">${esc(edge.relationship)}</data>
    </edge>
`;
    }
    if (skipped > 0) {
        getLogger('export').warn({ skipped }, 'Edges with unknown endpoints left out of GraphML');
    }

    xml += `  </graph>
</graphml>`;

    return xml;
}
