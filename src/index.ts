/**
 * querygate - compile-time trust gate for database query text
 *
 * This file re-exports all packages for convenience. Import directly from
 * individual packages when you only need one of them:
 *
 * @example
 * import { intoQueryString, assertQuerySafe } from '@querygate/query-string';
 * import { Logger } from '@querygate/logging';
 * import { EnvConfigProvider } from '@querygate/config';
 */

export * from '@querygate/query-string';

export * from '@querygate/logging';

export * from '@querygate/config';
