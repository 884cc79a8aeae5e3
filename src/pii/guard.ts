/**
 * Querywise - PII Guard
 *
 * Replaces sensitive literals with numbered placeholders before text is sent
 * to the language model, and restores them in the final answer. A mapping
 * lives for exactly one request.
 */

import logger from '../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

export const PII_CATEGORIES = [
  'EMAIL',
  'SSN',
  'CREDIT_CARD',
  'PHONE',
  'EMPLOYEE_ID',
  'PASSPORT',
  'PERSON',
] as const;

export type PiiCategory = (typeof PII_CATEGORIES)[number];

interface Detector {
  category: PiiCategory;
  pattern: RegExp;
}

interface Span {
  start: number;
  end: number;
  category: PiiCategory;
  priority: number;
}

export interface MaskResult {
  text: string;
  mapping: PiiMapping;
}

export interface UnmaskResult {
  text: string;
  /** Placeholders that had no entry in the mapping */
  unresolved: string[];
}

export const REDACTED = '[redacted]';

// Listed in priority order: when two spans overlap at the same start, the
// earlier detector wins.
const DETECTORS: Detector[] = [
  { category: 'EMAIL', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
  { category: 'SSN', pattern: /\b\d{3}-\d{2}-\d{4}\b/g },
  { category: 'CREDIT_CARD', pattern: /\b(?:\d{4}[-\s]?){3}\d{4}\b/g },
  { category: 'PHONE', pattern: /(?:\+1[-.\s]?)?(?:\(\d{3}\)|\b\d{3})[-.\s]?\d{3}[-.\s]?\d{4}\b/g },
  { category: 'EMPLOYEE_ID', pattern: /\bAA-\d{5,6}\b/g },
  { category: 'PASSPORT', pattern: /\b[A-Z]{1,2}\d{6,9}\b/g },
  {
    category: 'PERSON',
    pattern:
      /(?<=\b(?:Mr|Mrs|Ms|Miss|Dr|Prof|Capt|Captain|Officer)\.?\s+)[A-Z][a-z]+(?:[ '-][A-Z][a-z]+)?\b/g,
  },
];

const PLACEHOLDER_PATTERN = new RegExp(`\\[(?:${PII_CATEGORIES.join('|')})_\\d+\\]`, 'g');

// =============================================================================
// PII Mapping
// =============================================================================

/**
 * Per-request placeholder table. Tokens are numbered per category in order of
 * first appearance; the same literal always maps to the same token.
 */
export class PiiMapping {
  private byToken = new Map<string, string>();
  private byLiteral = new Map<string, string>();
  private counters = new Map<PiiCategory, number>();
  /** Placeholder-shaped text that was already in the input; never reissued */
  private reserved = new Set<string>();

  public tokenFor(category: PiiCategory, literal: string): string {
    const key = `${category}\u0000${literal}`;
    const existing = this.byLiteral.get(key);
    if (existing) {
      return existing;
    }

    let counter = this.counters.get(category) ?? 0;
    let token: string;
    do {
      counter += 1;
      token = `[${category}_${counter}]`;
    } while (this.reserved.has(token) || this.byToken.has(token));
    this.counters.set(category, counter);

    this.byToken.set(token, literal);
    this.byLiteral.set(key, token);
    return token;
  }

  public reserve(token: string): void {
    this.reserved.add(token);
  }

  public isReserved(token: string): boolean {
    return this.reserved.has(token);
  }

  public resolve(token: string): string | undefined {
    return this.byToken.get(token);
  }

  public get size(): number {
    return this.byToken.size;
  }

  public tokens(): string[] {
    return [...this.byToken.keys()];
  }

  /** Count of placeholders per category; safe to log */
  public counts(): Partial<Record<PiiCategory, number>> {
    const counts: Partial<Record<PiiCategory, number>> = {};
    for (const [category, value] of this.counters) {
      counts[category] = value;
    }
    return counts;
  }

  public clear(): void {
    this.byToken.clear();
    this.byLiteral.clear();
    this.counters.clear();
    this.reserved.clear();
  }
}

// =============================================================================
// PII Guard
// =============================================================================

export interface PiiGuardOptions {
  enabled: boolean;
}

export class PiiGuard {
  private enabled: boolean;

  constructor(options: PiiGuardOptions = { enabled: true }) {
    this.enabled = options.enabled;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Mask detected PII. Pass an existing mapping to keep numbering consistent
   * across several texts of the same request.
   */
  public mask(text: string, mapping: PiiMapping = new PiiMapping()): MaskResult {
    for (const literal of text.match(PLACEHOLDER_PATTERN) ?? []) {
      mapping.reserve(literal);
    }

    if (!this.enabled || text.length === 0) {
      return { text, mapping };
    }

    const spans = selectSpans(findSpans(text));
    if (spans.length === 0) {
      return { text, mapping };
    }

    let masked = '';
    let cursor = 0;
    for (const span of spans) {
      masked += text.slice(cursor, span.start);
      masked += mapping.tokenFor(span.category, text.slice(span.start, span.end));
      cursor = span.end;
    }
    masked += text.slice(cursor);

    return { text: masked, mapping };
  }

  /**
   * Mask every string cell of a row set in place of a copy
   */
  public maskRows(
    rows: ReadonlyArray<Record<string, unknown>>,
    mapping: PiiMapping
  ): Record<string, unknown>[] {
    if (!this.enabled) {
      return rows.map((row) => ({ ...row }));
    }
    return rows.map((row) => {
      const copy: Record<string, unknown> = {};
      for (const [column, value] of Object.entries(row)) {
        copy[column] = typeof value === 'string' ? this.mask(value, mapping).text : value;
      }
      return copy;
    });
  }

  /**
   * Restore placeholders. Placeholders with no mapping entry are replaced by
   * {@link REDACTED} and reported; placeholder-shaped text that was part of
   * the original input is left alone.
   */
  public unmask(text: string, mapping: PiiMapping): UnmaskResult {
    const unresolved: string[] = [];

    const restored = text.replace(PLACEHOLDER_PATTERN, (token) => {
      const literal = mapping.resolve(token);
      if (literal !== undefined) {
        return literal;
      }
      if (mapping.isReserved(token)) {
        return token;
      }
      unresolved.push(token);
      return REDACTED;
    });

    if (unresolved.length > 0) {
      logger.warn('Unresolved PII placeholders in model output', {
        count: unresolved.length,
      });
    }

    return { text: restored, unresolved };
  }

  /**
   * Run work with a fresh mapping that is always discarded afterwards
   */
  public async withMapping<T>(work: (mapping: PiiMapping) => Promise<T>): Promise<T> {
    const mapping = new PiiMapping();
    try {
      return await work(mapping);
    } finally {
      if (mapping.size > 0) {
        logger.debug('PII mapping released', { placeholders: mapping.counts() });
      }
      mapping.clear();
    }
  }
}

// =============================================================================
// Span Detection
// =============================================================================

function findSpans(text: string): Span[] {
  const spans: Span[] = [];
  DETECTORS.forEach((detector, priority) => {
    for (const match of text.matchAll(detector.pattern)) {
      if (match.index === undefined || match[0].length === 0) {
        continue;
      }
      spans.push({
        start: match.index,
        end: match.index + match[0].length,
        category: detector.category,
        priority,
      });
    }
  });
  return spans;
}

/**
 * Keep a non-overlapping subset: leftmost first, then detector priority,
 * then the longer span.
 */
function selectSpans(spans: Span[]): Span[] {
  const ordered = [...spans].sort(
    (a, b) => a.start - b.start || a.priority - b.priority || b.end - a.end
  );

  const selected: Span[] = [];
  let lastEnd = -1;
  for (const span of ordered) {
    if (span.start >= lastEnd) {
      selected.push(span);
      lastEnd = span.end;
    }
  }
  return selected;
}
