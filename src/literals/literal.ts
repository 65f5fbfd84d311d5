import * as O from "fp-ts/Option";
import { Option } from "fp-ts/Option";

import type { Datatype } from "./datatypes";
import { toText } from "./canonical";

/**
 * A typed integer literal.
 *
 * `value` is fixed at construction; `lexical` is the cached text form and
 * only canonicalization rewrites it.
 */
export type Literal = {
	readonly type: "Literal";
	readonly datatype: Datatype;
	lexical: Option<string>;
	readonly value: Option<bigint>;
};

/** Values that know how to turn themselves into an integer. */
export interface IntegerConvertible {
	toInteger(): bigint;
}

export type Input = string | number | bigint | IntegerConvertible;

export const Constructors = {
	Literal: (datatype: Datatype, lexical: Option<string>, value: Option<bigint>): Literal => ({ type: "Literal", datatype, lexical, value }),
	/** A plain `xsd:integer` with no cached text, as produced by the numeric operations. */
	Integer: (value: bigint): Literal => ({ type: "Literal", datatype: "integer", lexical: O.none, value: O.some(value) }),
};

export const isConvertible = (input: Input): input is IntegerConvertible => typeof input === "object" && typeof input.toInteger === "function";

export const display = (lit: Literal): string => `"${toText(lit)}"^^xsd:${lit.datatype}`;
