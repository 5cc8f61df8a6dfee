/**
 * Message decoration and value rendering.
 */

import type { Tag } from '@taglog/sdk';

function pad2(n: number): string {
	return String(n).padStart(2, '0');
}

/** Local wall-clock time as HH:MM:SS (24h, no date, no zone) */
export function formatClock(date: Date): string {
	return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** `[A,B] message` */
export function withTagHeader(message: string, tags: readonly Tag[]): string {
	return `[${tags.join(',')}] ${message}`;
}

/** `(HH:MM:SS) message` */
export function withTimestamp(message: string, date: Date): string {
	return `(${formatClock(date)}) ${message}`;
}

const PRIMITIVE_TYPE_NAMES: Record<string, string> = {
	number: 'Number',
	string: 'String',
	boolean: 'Boolean',
	bigint: 'BigInt',
	symbol: 'Symbol',
	function: 'Function',
};

/**
 * Runtime type name of a value: the wrapper name for primitives,
 * the constructor name for objects, `Object` when there is none.
 */
export function typeName(value: unknown): string {
	const primitive = PRIMITIVE_TYPE_NAMES[typeof value];
	if (primitive) return primitive;
	if (value === null || value === undefined) return 'null';
	const proto: unknown = Object.getPrototypeOf(value);
	if (proto && typeof proto === 'object' && 'constructor' in proto) {
		const ctor: unknown = proto.constructor;
		if (typeof ctor === 'function' && ctor.name) return ctor.name;
	}
	return 'Object';
}

/**
 * Default textual representation of a value.
 * Objects whose conversion fails (null prototype, non-callable or throwing
 * toString) fall back to the `[object Tag]` form.
 */
export function toText(value: unknown): string {
	if (typeof value === 'string') return value;
	try {
		return String(value);
	} catch {
		return Object.prototype.toString.call(value);
	}
}

/**
 * Diagnostic dump of positional values:
 * `[0: null][1: Number - 5]`, no separators, no terminator.
 */
export function renderValues(values: readonly unknown[]): string {
	let out = '';
	values.forEach((value, i) => {
		out +=
			value === null || value === undefined
				? `[${i}: null]`
				: `[${i}: ${typeName(value)} - ${toText(value)}]`;
	});
	return out;
}
