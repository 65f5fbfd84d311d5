import { Datatype, ancestry } from "./datatypes";

const INTEGER = /^[+-]?\d+$/;

/**
 * Lexical surface forms, for the datatypes that narrow their parent's.
 * Everything else inherits from the nearest declaring ancestor.
 */
const GRAMMARS: Readonly<Partial<Record<Datatype, RegExp>>> = {
	integer: INTEGER,
	nonPositiveInteger: /^(?:[+-]?0+|-\d+)$/,
	negativeInteger: /^-\d+$/,
	nonNegativeInteger: /^(?:[+-]?0+|\+?\d+)$/,
	unsignedLong: /^\d+$/,
	positiveInteger: /^\+?\d+$/,
};

export const declares = (datatype: Datatype): boolean => GRAMMARS[datatype] !== undefined;

// every ancestry ends at `integer`, so the fallback only satisfies the type
export const grammarOf = (datatype: Datatype): RegExp =>
	ancestry(datatype)
		.map(dt => GRAMMARS[dt])
		.find(grammar => grammar !== undefined) ?? INTEGER;

/** Checks the surface syntax only; the value's domain is not consulted. */
export const matches = (datatype: Datatype, text: string): boolean => grammarOf(datatype).test(text);
