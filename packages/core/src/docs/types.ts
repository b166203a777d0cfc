import type { Contract } from '../contract/types.js';
import type { HttpMethod } from '../http/types.js';

export interface DocumentInfo {
  title: string;
  version: string;
  description?: string;
}

export type PathItem = Partial<Record<HttpMethod, Contract>>;

/**
 * Compiled description of a whole route table: path template and method
 * to merged contract.
 */
export interface AggregateDocument {
  readonly info: DocumentInfo;
  readonly paths: Readonly<Record<string, PathItem>>;
}
