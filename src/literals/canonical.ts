import * as O from "fp-ts/Option";
import * as F from "fp-ts/function";

import type { Literal } from "./literal";

/** Minimal signed decimal: no leading zeros, no `+`, `-` only for negatives. */
export const canonicalText = (value: bigint): string => value.toString(10);

/** Rewrites the cached text form in place. Leaves literals without a value untouched. */
export const canonicalize = (lit: Literal): Literal => {
	if (O.isSome(lit.value)) {
		lit.lexical = O.some(canonicalText(lit.value.value));
	}
	return lit;
};

/**
 * The cached text if any, otherwise the value rendered on demand.
 * Nothing is stored, and a literal with neither yields `""`.
 */
export const toText = (lit: Literal): string =>
	F.pipe(
		lit.lexical,
		O.alt(() => O.map(canonicalText)(lit.value)),
		O.getOrElse(() => ""),
	);
