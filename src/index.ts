export { QueryService } from './service.js';
export type { QueryServiceConfig, CatalogSource } from './service.js';

export { Catalog, CatalogProvider, buildCatalogEntry } from './catalog/catalog.js';
export { introspectCatalog } from './catalog/introspect.js';
export type { IntrospectOptions } from './catalog/introspect.js';
export type { CatalogEntry, FieldMeta, LogicalType } from './catalog/types.js';

export { tokenize } from './query/lexer.js';
export type { Token, TokenKind, ComparisonOperator } from './query/tokens.js';
export { parse, parseQuery } from './query/parser.js';
export type { ParsedQuery, PredicateNode, Comparison, Conjunction, SqlValue } from './query/types.js';
export { resolve } from './query/resolver.js';
export { normalize } from './query/normalizer.js';
export { compile } from './query/compiler.js';
export type { CompiledQuery, SqlParam } from './query/compiler.js';

export { PostgresQueryExecutor } from './store/executor.js';
export type { QueryExecutor, QueryExecutorConfig } from './store/executor.js';
export type { FieldValue, Row } from './store/row-mapper.js';
export { applySchema } from './store/schema.js';

export { buildEnvelope } from './result/envelope.js';
export type { ResultEnvelope, SObjectRecord } from './result/envelope.js';
export { toDescribeResult, toObjectList } from './result/describe.js';
export type { DescribeResult, FieldDescription, ObjectListResult } from './result/describe.js';

export { buildServer } from './api/server.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { createLogger } from './logger.js';

export {
  QueryError,
  QuerySyntaxError,
  ObjectNotFoundError,
  FieldNotFoundError,
  TypeMismatchError,
  LiteralError,
  BackendError,
  QueryTimeoutError,
  ConfigError,
  toErrorResponse,
} from './errors.js';
export type { ErrorCode, ErrorResponse } from './errors.js';
