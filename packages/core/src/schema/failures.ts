/**
 * Structured validation failures.
 *
 * A FailureTree mirrors the shape of the rejected value: maps are keyed
 * like the value, and every failing position holds a leaf (possibly
 * wrapped with the name of the schema that rejected it).
 */
import type { ErrorObject } from 'ajv';

import { isSchemaObject, type Schema } from '../types/schema.js';
import { hasOwn, isPlainRecord, setOwn } from '../util/records.js';

export const MISSING_REQUIRED_KEY = 'missing-required-key';
export const DISALLOWED_KEY = 'disallowed-key';

// Keywords whose error summarizes the branch errors reported before it
const SUMMARY_KEYWORDS = new Set(['anyOf', 'oneOf', 'not', 'if']);

export class LeafFailure {
  constructor(
    public readonly keyword: string,
    public readonly message: string,
    public readonly value: unknown
  ) {}

  toString(): string {
    if (this.keyword === 'required') return MISSING_REQUIRED_KEY;
    if (this.keyword === 'additionalProperties') return DISALLOWED_KEY;
    return `${this.message}, got ${renderValue(this.value)}`;
  }
}

export class NamedFailure {
  constructor(
    public readonly name: string,
    public readonly error: FailureTree
  ) {}
}

export interface FailureMap {
  [key: string]: FailureTree;
}

export type FailureTree = FailureMap | NamedFailure | LeafFailure;

/**
 * Schema, offending value and failure tree of a rejected coercion
 */
export class SchemaMismatch<S = Schema> {
  constructor(
    public readonly schema: S,
    public readonly value: unknown,
    public readonly error: FailureTree
  ) {}
}

export function isFailureMap(value: unknown): value is FailureMap {
  return isPlainRecord(value);
}

export function renderValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'bigint') return `${value.toString()}n`;
  return JSON.stringify(value) ?? String(value);
}

export function parsePointer(pointer: string): string[] {
  if (pointer === '') return [];
  return pointer
    .slice(1)
    .split('/')
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

function toPointer(segments: readonly string[]): string {
  return segments
    .map((segment) => '/' + segment.replace(/~/g, '~0').replace(/\//g, '~1'))
    .join('');
}

interface TreeHolder {
  tree?: FailureTree;
}

function insert(
  holder: TreeHolder,
  segments: readonly string[],
  failure: FailureTree,
  override: boolean
): void {
  if (segments.length === 0) {
    if (holder.tree === undefined || override) holder.tree = failure;
    return;
  }
  if (holder.tree === undefined) holder.tree = {};
  // a failure recorded higher up covers everything below it
  if (!isFailureMap(holder.tree)) return;

  let node: FailureMap = holder.tree;
  for (const segment of segments.slice(0, -1)) {
    const child = hasOwn(node, segment) ? node[segment] : undefined;
    if (child === undefined) {
      const created: FailureMap = {};
      setOwn(node, segment, created);
      node = created;
    } else if (isFailureMap(child)) {
      node = child;
    } else {
      return;
    }
  }
  const last = segments[segments.length - 1] ?? '';
  if (!hasOwn(node, last) || override) setOwn(node, last, failure);
}

function titleOf(schema: unknown): string | undefined {
  return isSchemaObject(schema) && typeof schema.title === 'string'
    ? schema.title
    : undefined;
}

function applyNames(
  tree: FailureTree,
  segments: string[],
  names: ReadonlyMap<string, string>
): FailureTree {
  if (!isFailureMap(tree)) return tree;
  const out: FailureMap = {};
  for (const [key, child] of Object.entries(tree)) {
    setOwn(out, key, applyNames(child, [...segments, key], names));
  }
  const name = names.get(toPointer(segments));
  return name === undefined ? out : new NamedFailure(name, out);
}

/**
 * Convert Ajv errors (collected with allErrors + verbose) into a tree.
 */
export function failureTreeFromAjv(
  errors: readonly ErrorObject[]
): FailureTree {
  const holder: TreeHolder = {};
  const names = new Map<string, string>();

  for (const error of errors) {
    const segments = parsePointer(error.instancePath);
    const title = titleOf(error.parentSchema);
    if (title !== undefined && !names.has(error.instancePath)) {
      names.set(error.instancePath, title);
    }

    const message = error.message ?? error.keyword;
    switch (error.keyword) {
      case 'required': {
        const missing: unknown = error.params['missingProperty'];
        insert(
          holder,
          [...segments, String(missing)],
          new LeafFailure('required', message, undefined),
          false
        );
        break;
      }
      case 'additionalProperties': {
        const extra = String(error.params['additionalProperty']);
        const data: unknown = error.data;
        const value =
          isPlainRecord(data) && hasOwn(data, extra) ? data[extra] : undefined;
        insert(
          holder,
          [...segments, extra],
          new LeafFailure('additionalProperties', message, value),
          false
        );
        break;
      }
      default: {
        const leaf = new LeafFailure(error.keyword, message, error.data);
        insert(
          holder,
          segments,
          title === undefined ? leaf : new NamedFailure(title, leaf),
          SUMMARY_KEYWORDS.has(error.keyword)
        );
      }
    }
  }

  return applyNames(holder.tree ?? {}, [], names);
}
