/**
 * Querywise - Schema Catalog
 *
 * Holds the current {@link CatalogSnapshot} behind a single reference and
 * selects the schema subset for a question. Small catalogs are sent whole;
 * larger ones are ranked by embedding similarity, falling back to keyword
 * overlap when the embedding backend cannot answer.
 */

import * as chokidar from 'chokidar';

import type { LanguageModel } from '../llm/types.js';
import logger, { logConfig } from '../utils/logger.js';
import {
  CatalogUnavailableError,
  RequestCancelledError,
  type CatalogConfig,
} from '../utils/types.js';

import { loadCatalogFile } from './loader.js';
import { CatalogSnapshot, renderSchema } from './snapshot.js';
import type { ReloadResult, RetrievalResult, SchemaEntry } from './types.js';

const EMBEDDING_BATCH_SIZE = 32;

const STOPWORDS = new Set([
  'the', 'and', 'for', 'are', 'was', 'were', 'with', 'what', 'which', 'who', 'whom',
  'how', 'many', 'much', 'show', 'list', 'give', 'get', 'all', 'any', 'from', 'that',
  'this', 'these', 'those', 'have', 'has', 'had', 'there', 'their', 'into', 'than',
  'then', 'them', 'they', 'each', 'per', 'out', 'our', 'your', 'you', 'can', 'please',
  'find', 'tell', 'about', 'based', 'does', 'did', 'not',
]);

export interface RetrieveOptions {
  topK?: number;
  signal?: AbortSignal;
}

// =============================================================================
// Schema Catalog
// =============================================================================

export class SchemaCatalog {
  private config: CatalogConfig;
  private llm: LanguageModel | null;
  private snapshot: CatalogSnapshot | null = null;
  private inflightReload: Promise<ReloadResult> | null = null;
  private watcher: chokidar.FSWatcher | null = null;

  constructor(config: CatalogConfig, llm: LanguageModel | null = null) {
    this.config = config;
    this.llm = llm;
  }

  // ===========================================================================
  // Loading
  // ===========================================================================

  /**
   * Build a new snapshot from the catalog file and publish it. Concurrent
   * calls share one build; an unchanged file keeps the current snapshot.
   */
  public reload(): Promise<ReloadResult> {
    if (this.inflightReload === null) {
      this.inflightReload = this.buildAndPublish().finally(() => {
        this.inflightReload = null;
      });
    }
    return this.inflightReload;
  }

  private async buildAndPublish(): Promise<ReloadResult> {
    const startedAt = Date.now();
    const content = await loadCatalogFile(this.config.path);
    const current = this.snapshot;

    if (current !== null && current.version === content.hash) {
      logConfig('Schema catalog unchanged', { path: this.config.path, version: shortVersion(content.hash) });
      return { changed: false, version: current.version, stats: { ...current.stats }, loadedAt: current.loadedAt };
    }

    const entries = this.config.embedOnLoad ? await this.embedMissing(content.entries) : content.entries;
    const next = new CatalogSnapshot(entries, content.databases, content.hash);

    // Publish
    this.snapshot = next;

    logConfig('Schema catalog loaded', {
      path: this.config.path,
      version: shortVersion(next.version),
      ...next.stats,
      durationMs: Date.now() - startedAt,
    });

    return { changed: true, version: next.version, stats: { ...next.stats }, loadedAt: next.loadedAt };
  }

  private async embedMissing(entries: SchemaEntry[]): Promise<SchemaEntry[]> {
    if (this.llm === null || !this.llm.supportsEmbeddings()) {
      return entries;
    }

    const missing = entries.filter((entry) => entry.embedding === undefined);
    if (missing.length === 0) {
      return entries;
    }

    const vectors = new Map<string, number[]>();
    try {
      for (let i = 0; i < missing.length; i += EMBEDDING_BATCH_SIZE) {
        const batch = missing.slice(i, i + EMBEDDING_BATCH_SIZE);
        const embedded = await this.llm.embed(batch.map(embeddingText));
        batch.forEach((entry, index) => {
          const vector = embedded[index];
          if (vector) {
            vectors.set(entry.qualifiedName, vector);
          }
        });
      }
    } catch (error) {
      logger.warn('Could not embed catalog tables; semantic retrieval will use keyword fallback', {
        embedded: vectors.size,
        missing: missing.length,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return entries.map((entry) => {
      const vector = vectors.get(entry.qualifiedName);
      return vector ? { ...entry, embedding: vector } : entry;
    });
  }

  // ===========================================================================
  // Access
  // ===========================================================================

  public getSnapshot(): CatalogSnapshot | null {
    return this.snapshot;
  }

  /**
   * The current snapshot; throws when nothing usable is loaded
   */
  public requireSnapshot(): CatalogSnapshot {
    const snapshot = this.snapshot;
    if (snapshot === null) {
      throw new CatalogUnavailableError('Schema catalog is not loaded');
    }
    if (snapshot.isEmpty) {
      throw new CatalogUnavailableError('Schema catalog contains no tables');
    }
    return snapshot;
  }

  public isReady(): boolean {
    return this.snapshot !== null && !this.snapshot.isEmpty;
  }

  public usesFullDump(snapshot: CatalogSnapshot): boolean {
    return snapshot.stats.estimatedTokens < this.config.fullDumpTokenThreshold;
  }

  // ===========================================================================
  // Retrieval
  // ===========================================================================

  /**
   * Schema subset for a question, most relevant table first
   */
  public async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    // Pin one snapshot for the whole call so a concurrent reload is invisible
    const snapshot = this.requireSnapshot();
    const topK = Math.max(1, options.topK ?? this.config.topK);

    if (this.usesFullDump(snapshot)) {
      return { entries: snapshot.entries, strategy: 'full-dump', schemaText: snapshot.schemaText };
    }

    const semantic = await this.semanticSearch(snapshot, question, topK, options.signal);
    if (semantic !== null && semantic.length > 0) {
      return { entries: semantic, strategy: 'semantic', schemaText: renderSchema(semantic) };
    }

    const keyword = keywordSearch(snapshot.entries, question, topK);
    return { entries: keyword, strategy: 'keyword', schemaText: renderSchema(keyword) };
  }

  private async semanticSearch(
    snapshot: CatalogSnapshot,
    question: string,
    topK: number,
    signal?: AbortSignal
  ): Promise<SchemaEntry[] | null> {
    if (this.llm === null || !this.llm.supportsEmbeddings() || snapshot.stats.embeddedTables === 0) {
      return null;
    }

    let queryVector: number[] | undefined;
    try {
      [queryVector] = await this.llm.embed([question], { signal });
    } catch (error) {
      if (error instanceof RequestCancelledError || signal?.aborted) {
        throw error;
      }
      logger.warn('Question embedding failed, using keyword retrieval', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    if (!queryVector) {
      return null;
    }

    const query = queryVector;
    return snapshot.entries
      .flatMap((entry) =>
        entry.embedding ? [{ entry, score: cosineSimilarity(query, entry.embedding) }] : []
      )
      .filter((scored) => scored.score >= this.config.minSimilarity)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map((scored) => scored.entry);
  }

  // ===========================================================================
  // Watching
  // ===========================================================================

  public startWatching(): void {
    if (this.watcher !== null) {
      return;
    }

    this.watcher = chokidar.watch(this.config.path, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 500,
        pollInterval: 100,
      },
    });

    this.watcher.on('change', () => {
      this.reload().catch((error: unknown) => {
        logger.error('Failed to reload schema catalog', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });

    logConfig('Watching schema catalog for changes', { path: this.config.path });
  }

  public async stopWatching(): Promise<void> {
    if (this.watcher !== null) {
      await this.watcher.close();
      this.watcher = null;
    }
  }
}

// =============================================================================
// Scoring
// =============================================================================

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Lowercased significant words; underscores split so `base_airport` yields
 * `base` and `airport`; a trailing plural `s` is dropped.
 */
export function significantTokens(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    if (word.length < 3 || STOPWORDS.has(word)) {
      continue;
    }
    tokens.add(word.length > 3 && word.endsWith('s') && !word.endsWith('ss') ? word.slice(0, -1) : word);
  }
  return tokens;
}

/**
 * Rank by the number of significant question words found in the table's
 * name, columns and description. Always returns `topK` entries (or the
 * whole catalog if smaller), ties kept in catalog order.
 */
export function keywordSearch(entries: readonly SchemaEntry[], question: string, topK: number): SchemaEntry[] {
  const questionTokens = significantTokens(question);

  return entries
    .map((entry, index) => {
      const document = significantTokens(
        [
          entry.database,
          entry.table,
          entry.description,
          ...entry.columns.map((column) => `${column.name} ${column.description ?? ''}`),
        ].join(' ')
      );
      let score = 0;
      for (const token of questionTokens) {
        if (document.has(token)) {
          score += 1;
        }
      }
      return { entry, score, index };
    })
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, topK)
    .map((scored) => scored.entry);
}

function embeddingText(entry: SchemaEntry): string {
  const columns = entry.columns.map((column) => column.name).join(', ');
  return `${entry.qualifiedName}: ${entry.description} Columns: ${columns}`;
}

function shortVersion(version: string): string {
  return version.slice(0, 12);
}
