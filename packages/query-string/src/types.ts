/**
 * Type definitions for QueryString
 *
 * Compile-time constant text crosses the trust gate directly.
 * Everything else is wrapped in AssertQuerySafe first.
 */

import type { SharedText } from './shared-text';

/**
 * Whether a query's payload outlives the buffer it came from.
 *
 * - `'static'`: payload is independent of any caller-owned buffer
 * - `'borrowed'`: payload is tied to a caller-owned buffer
 */
export type Lifetime = 'static' | 'borrowed';

/**
 * Internal storage strategy of a QueryString.
 *
 * `'boxed'` is the exclusively-owned mode.
 */
export type StorageMode = 'borrowed' | 'static' | 'boxed' | 'shared';

/**
 * Storage of a QueryString payload, one variant per storage mode.
 * @internal
 */
export type QueryRepr =
	| { readonly kind: 'borrowed'; readonly bytes: Uint8Array; readonly text: string }
	| { readonly kind: 'static'; readonly text: string }
	| { readonly kind: 'boxed'; readonly text: string }
	| { readonly kind: 'shared'; readonly shared: SharedText };

/**
 * Members of S that describe more than one string (`string`, template patterns).
 * A mapped type over such a key becomes an index signature, which `{}` satisfies.
 */
type OpenMember<S extends string> = S extends unknown ? ({} extends Record<S, true> ? S : never) : never;

/**
 * Resolves to S when every member of S is a finite string literal, otherwise `never`.
 *
 * @example
 * ```typescript
 * type A = ConstantText<'SELECT 1'>;             // 'SELECT 1'
 * type B = ConstantText<'SELECT 1' | 'SELECT 2'>; // 'SELECT 1' | 'SELECT 2'
 * type C = ConstantText<string>;                 // never
 * type D = ConstantText<`SELECT ${number}`>;     // never
 * ```
 */
export type ConstantText<S extends string> = [OpenMember<S>] extends [never] ? S : never;

/**
 * Values AssertQuerySafe may wrap.
 *
 * - `string` becomes exclusively-owned storage
 * - `Uint8Array` (UTF-8, e.g. a pooled Buffer) becomes borrowed storage
 * - `SharedText` becomes shared storage
 */
export type AssertableText = string | Uint8Array | SharedText;
