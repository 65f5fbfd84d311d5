import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as F from "fp-ts/function";
import { Either } from "fp-ts/Either";
import { Option } from "fp-ts/Option";

import * as Err from "./errors";
import { Constructors, Literal } from "./literal";

const valueOf = (lit: Literal): Either<Err.Cause, bigint> =>
	F.pipe(
		lit.value,
		E.fromOption(() => Err.ValueAbsent(lit)),
	);

const lift =
	<A>(f: (n: bigint, lit: Literal) => A) =>
	(lit: Literal): Either<Err.Cause, A> =>
		F.pipe(
			valueOf(lit),
			E.map(n => f(n, lit)),
		);

/** The results below are always plain `xsd:integer` literals, whatever the receiver's datatype. */
export const predecessor = lift(n => Constructors.Integer(n - 1n));
export const successor = lift(n => Constructors.Integer(n + 1n));
export const next = successor;

export const isEven = lift(n => n % 2n === 0n);
export const isOdd = lift(n => n % 2n !== 0n);

export const isZero = lift(n => n === 0n);

/** Positive literals come back as the same instance; anything else is wrapped anew. */
export const absoluteValue = lift((n, lit) => (n > 0n ? lit : Constructors.Integer(-n)));

export const nonzero = lift((n, lit): Option<Literal> => (n !== 0n ? O.some(lit) : O.none));
