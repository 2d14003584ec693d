import { Catalog } from './catalog/catalog.js';
import type { CatalogProvider } from './catalog/catalog.js';
import type { CatalogEntry } from './catalog/types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { compile } from './query/compiler.js';
import type { CompiledQuery } from './query/compiler.js';
import { tokenize } from './query/lexer.js';
import { normalize } from './query/normalizer.js';
import { parse } from './query/parser.js';
import { resolve } from './query/resolver.js';
import { toDescribeResult, toObjectList } from './result/describe.js';
import type { DescribeResult, ObjectListResult } from './result/describe.js';
import { DEFAULT_API_VERSION, buildEnvelope } from './result/envelope.js';
import type { ResultEnvelope } from './result/envelope.js';
import type { QueryExecutor } from './store/executor.js';

export type CatalogSource = Catalog | CatalogProvider;

export interface QueryServiceConfig {
  catalog: CatalogSource;
  executor: QueryExecutor;
  apiVersion?: string;
  logger?: Logger;
}

/**
 * Entry point for query and describe requests. Stateless apart from the
 * shared catalog; every call reads one catalog snapshot.
 */
export class QueryService {
  private readonly source: CatalogSource;
  private readonly executor: QueryExecutor;
  private readonly apiVersion: string;
  private readonly logger: Logger;

  constructor(config: QueryServiceConfig) {
    this.source = config.catalog;
    this.executor = config.executor;
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.logger = config.logger ?? silentLogger;
  }

  catalog(): Catalog {
    return this.source instanceof Catalog ? this.source : this.source.current();
  }

  /** Runs every stage up to SQL generation without touching the database. */
  compile(soql: string): CompiledQuery {
    const parsed = parse(tokenize(soql));
    return compile(normalize(resolve(parsed, this.catalog())));
  }

  async query(soql: string): Promise<ResultEnvelope> {
    const started = Date.now();
    const compiled = this.compile(soql);
    const rows = await this.executor.execute(compiled);
    const envelope = buildEnvelope(rows, compiled, { apiVersion: this.apiVersion });
    this.logger.debug(
      {
        objectName: compiled.objectName,
        params: compiled.params.length,
        rows: envelope.totalSize,
        durationMs: Date.now() - started,
      },
      'query executed',
    );
    return envelope;
  }

  describe(objectName: string): CatalogEntry {
    return this.catalog().describe(objectName);
  }

  describeResult(objectName: string): DescribeResult {
    return toDescribeResult(this.describe(objectName));
  }

  listObjects(): ObjectListResult {
    return toObjectList(this.catalog());
  }
}
