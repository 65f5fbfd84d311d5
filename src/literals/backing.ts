import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as F from "fp-ts/function";
import { Either } from "fp-ts/Either";
import { Option } from "fp-ts/Option";

import * as Err from "./errors";
import { toText } from "./canonical";
import { Literal } from "./literal";

/** An arbitrary-precision integer implementation the literals can be handed to. */
export type Provider<H> = {
	readonly name: string;
	fromDecimal: (text: string) => H;
};

export const Native: Provider<bigint> = {
	name: "native",
	fromDecimal: text => BigInt(text.trim()),
};

let provider: Provider<unknown> | undefined = undefined;

export const setBackingProvider = <H>(p: Provider<H>) => {
	provider = p;
};
export const getBackingProvider = (): Option<Provider<unknown>> => O.fromNullable(provider);
export const clearBackingProvider = () => {
	provider = undefined;
};

/**
 * Hands the literal's text form to a big-integer provider: the one passed in,
 * or else the registered one.
 */
export function toBigIntegerBacking<H>(lit: Literal, using: Provider<H>): Either<Err.Cause, H>;
export function toBigIntegerBacking(lit: Literal): Either<Err.Cause, unknown>;
export function toBigIntegerBacking<H>(lit: Literal, using?: Provider<H>): Either<Err.Cause, unknown> {
	const chosen: Option<Provider<unknown>> = using !== undefined ? O.some(using) : getBackingProvider();
	return F.pipe(
		lit.value,
		E.fromOption(() => Err.ValueAbsent(lit)),
		E.chain(() =>
			F.pipe(
				chosen,
				E.fromOption(() => Err.CapabilityUnavailable("big-integer")),
			),
		),
		E.chain(p => {
			const text = toText(lit);
			return E.tryCatch(
				() => p.fromDecimal(text),
				e => Err.BackingFailure(p.name, text, E.toError(e).message),
			);
		}),
	);
}
