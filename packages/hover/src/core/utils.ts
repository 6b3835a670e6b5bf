/**
 * Core utilities: CSS class merging, undefined-stripping, structural equality, CSS custom property readers, dev warnings.
 */
import { type ClassValue, clsx } from 'clsx';
import { Equal } from 'effect';
import { isValidElement, type ReactElement } from 'react';
import { twMerge } from 'tailwind-merge';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	prefix: '[hover-scope]',
	radix: 10,
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const cn = (...inputs: readonly ClassValue[]): string => twMerge(clsx(inputs));
/** Filter object to entries where value is not undefined. */
const defined = <T extends Record<string, unknown>>(obj: T): { [K in keyof T as T[K] extends undefined ? never : K]: Exclude<T[K], undefined> } =>
	Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined)) as never;
const isElement = (value: unknown): value is ReactElement => typeof value === 'object' && value !== null && isValidElement(value);
const isPlain = (value: unknown): value is Readonly<Record<string, unknown>> =>
	typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
const sameEntries = (a: unknown, b: unknown): boolean =>
	isPlain(a) && isPlain(b) && Object.keys(a).length === Object.keys(b).length && Object.keys(a).every((key) => same(a[key], b[key]));
/** Structural equality over plain records, arrays, effect Data values and React elements; functions by reference. */
const same = (a: unknown, b: unknown): boolean =>
	Object.is(a, b) ||
	(Equal.isEqual(a) && Equal.equals(a, b)) ||
	(Array.isArray(a) && Array.isArray(b) && a.length === b.length && a.every((item, index) => same(item, b[index]))) ||
	(isElement(a) && isElement(b) ? a.type === b.type && a.key === b.key && sameEntries(a.props, b.props) : sameEntries(a, b));
const readCssVar = (name: string): string => {
	const root = globalThis.document?.documentElement;
	return root === undefined ? '' : getComputedStyle(root).getPropertyValue(name).trim();
};
const readCssMs = (name: string): number => {
	const parsed = Number.parseInt(readCssVar(name).replace('ms', ''), B.radix);
	return Number.isNaN(parsed) ? 0 : parsed;
};
const readCssPx = (name: string): number => {
	const parsed = Number.parseFloat(readCssVar(name).replace('px', ''));
	return Number.isNaN(parsed) ? 0 : parsed;
};
const warn = (message: string): void => {
	const nodeEnv = typeof process === 'undefined' ? undefined : process.env['NODE_ENV'];
	nodeEnv === 'production' || console.warn(`${B.prefix} ${message}`);
};

// --- [EXPORT] ----------------------------------------------------------------

export { B as UTILS_TUNING, cn, defined, readCssMs, readCssPx, same, warn };
