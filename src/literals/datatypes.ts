/**
 * The XML Schema integer family as a flat table.
 *
 *   integer
 *   ├── nonPositiveInteger
 *   │   └── negativeInteger
 *   ├── long
 *   │   └── int
 *   │       └── short
 *   │           └── byte
 *   └── nonNegativeInteger
 *       ├── unsignedLong
 *       │   └── unsignedInt
 *       │       └── unsignedShort
 *       │           └── unsignedByte
 *       └── positiveInteger
 *
 * Each entry names its parent and the bounds it declares. Inheritance is
 * resolved by walking the table, see `ancestry` and `domainOf`.
 *
 * @see https://www.w3.org/TR/xmlschema-2/#built-in-derived
 */
import _ from "lodash";
import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as F from "fp-ts/function";
import { Either } from "fp-ts/Either";
import { Option } from "fp-ts/Option";

import * as Err from "./errors";

export const XSD = "http://www.w3.org/2001/XMLSchema#";

export type Datatype =
	| "integer"
	| "nonPositiveInteger"
	| "negativeInteger"
	| "long"
	| "int"
	| "short"
	| "byte"
	| "nonNegativeInteger"
	| "unsignedLong"
	| "unsignedInt"
	| "unsignedShort"
	| "unsignedByte"
	| "positiveInteger";

/** Inclusive bounds; an absent side is unbounded. */
export type Domain = { min?: bigint; max?: bigint };

type Entry = { parent: Datatype | null; domain: Domain };

const signed = (bits: bigint): Domain => ({ min: -(2n ** (bits - 1n)), max: 2n ** (bits - 1n) - 1n });
const unsigned = (bits: bigint): Domain => ({ min: 0n, max: 2n ** bits - 1n });

const TABLE: Readonly<Record<Datatype, Entry>> = {
	integer: { parent: null, domain: {} },
	nonPositiveInteger: { parent: "integer", domain: { max: 0n } },
	negativeInteger: { parent: "nonPositiveInteger", domain: { max: -1n } },
	long: { parent: "integer", domain: signed(64n) },
	int: { parent: "long", domain: signed(32n) },
	short: { parent: "int", domain: signed(16n) },
	byte: { parent: "short", domain: signed(8n) },
	nonNegativeInteger: { parent: "integer", domain: { min: 0n } },
	unsignedLong: { parent: "nonNegativeInteger", domain: unsigned(64n) },
	unsignedInt: { parent: "unsignedLong", domain: unsigned(32n) },
	unsignedShort: { parent: "unsignedInt", domain: unsigned(16n) },
	unsignedByte: { parent: "unsignedShort", domain: unsigned(8n) },
	positiveInteger: { parent: "nonNegativeInteger", domain: { min: 1n } },
};

export const all: ReadonlyArray<Datatype> = [
	"integer",
	"nonPositiveInteger",
	"negativeInteger",
	"long",
	"int",
	"short",
	"byte",
	"nonNegativeInteger",
	"unsignedLong",
	"unsignedInt",
	"unsignedShort",
	"unsignedByte",
	"positiveInteger",
];

export const isDatatype = (name: string): name is Datatype => _.has(TABLE, name);

export const parent = (datatype: Datatype): Option<Datatype> => O.fromNullable(TABLE[datatype].parent);

export const iri = (datatype: Datatype): string => `${XSD}${datatype}`;

export const fromIri = (tag: string): Option<Datatype> =>
	F.pipe(
		tag.startsWith(XSD) ? O.some(tag.slice(XSD.length)) : O.none,
		O.filter(isDatatype),
	);

/** Accepts either a local name (`byte`), a prefixed name (`xsd:byte`) or a full IRI. */
export const resolve = (tag: string): Either<Err.Cause, Datatype> => {
	const local = tag.startsWith("xsd:") ? tag.slice(4) : tag;
	return F.pipe(
		isDatatype(local) ? O.some(local) : fromIri(tag),
		E.fromOption(() => Err.UnknownDatatype(tag)),
	);
};

/** The datatype itself followed by each of its ancestors, ending at `integer`. */
export const ancestry = (datatype: Datatype): Datatype[] => {
	const up = TABLE[datatype].parent;
	return up === null ? [datatype] : [datatype, ...ancestry(up)];
};

export const isDerivedFrom = (datatype: Datatype, ancestor: Datatype): boolean => ancestry(datatype).includes(ancestor);

const tighter = (pick: (a: bigint, b: bigint) => bigint) => (a: bigint | undefined, b: bigint | undefined) =>
	a === undefined ? b : b === undefined ? a : pick(a, b);
const maxOf = tighter((a, b) => (a > b ? a : b));
const minOf = tighter((a, b) => (a < b ? a : b));

/** The effective domain: every bound declared along the ancestry, intersected. */
export const domainOf = (datatype: Datatype): Domain =>
	ancestry(datatype).reduce<Domain>((acc, dt) => {
		const { min, max } = TABLE[dt].domain;
		return { min: maxOf(acc.min, min), max: minOf(acc.max, max) };
	}, {});

export const inDomain = (datatype: Datatype, value: bigint): boolean => {
	const { min, max } = domainOf(datatype);
	return (min === undefined || value >= min) && (max === undefined || value <= max);
};
