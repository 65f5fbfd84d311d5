import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import { Either } from "fp-ts/Either";

import * as Err from "../errors";

/** Returns the right side, failing the test with the displayed cause otherwise. */
export const unwrap = <A>(result: Either<Err.Cause, A>): A =>
	F.pipe(
		result,
		E.getOrElse((cause): A => {
			throw new Error(Err.display(cause));
		}),
	);

export const failure = <A>(result: Either<Err.Cause, A>): Err.Cause =>
	F.pipe(
		result,
		E.swap,
		E.getOrElse((): Err.Cause => {
			throw new Error("Expected a failure");
		}),
	);
