import { match, P } from "ts-pattern";
import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as F from "fp-ts/function";
import { Either } from "fp-ts/Either";
import { Option } from "fp-ts/Option";

import { options as config, Policy } from "@xsd/shared/config/options";
import * as Log from "@xsd/shared/logging";

import * as DT from "./datatypes";
import * as Err from "./errors";
import * as G from "./grammar";
import { canonicalize } from "./canonical";
import { Constructors, Input, IntegerConvertible, Literal, display, isConvertible } from "./literal";

export type Options = {
	/** Text to cache instead of the input's own. */
	lexical?: string;
	datatype?: DT.Datatype;
	/** Overrides the configured policy for this call. */
	policy?: Policy;
	/** Canonicalize before handing the literal out. */
	canonical?: boolean;
};

const DECIMAL = /^[+-]?\d+$/;

const fromText = (text: string): Option<bigint> => {
	const trimmed = text.trim();
	if (!DECIMAL.test(trimmed)) {
		Log.logger.debug(`Not a decimal integer: "${text}"`);
		return O.none;
	}
	return O.some(BigInt(trimmed));
};

const fromNumber = (n: number): Option<bigint> => {
	if (!Number.isFinite(n)) {
		Log.logger.debug(`Not a finite number: ${n}`);
		return O.none;
	}
	return O.some(BigInt(Math.trunc(n)));
};

const fromConvertible = (c: IntegerConvertible): Option<bigint> =>
	F.pipe(
		E.tryCatch(() => c.toInteger(), E.toError),
		E.match(
			(e): Option<bigint> => {
				Log.logger.debug(`Integer conversion failed: ${e.message}`);
				return O.none;
			},
			O.some,
		),
	);

/** Parses any accepted input into an integer. Failures are reported as `none`, never thrown. */
export const parse = (input: Input): Option<bigint> =>
	Log.scoped("lexical", () =>
		match(input)
			.with(P.string, fromText)
			.with(P.bigint, n => O.some(n))
			.with(P.number, fromNumber)
			.when(isConvertible, fromConvertible)
			.otherwise(() => O.none),
	);

/**
 * Builds a literal without any checks.
 *
 * The cached text is `options.lexical` when given, else the input itself when
 * it is a string. A failed parse leaves `value` absent.
 */
export const make = (input: Input, options: Options = {}): Literal => {
	const lexical = options.lexical !== undefined ? O.some(options.lexical) : typeof input === "string" ? O.some(input) : O.none;
	return Constructors.Literal(options.datatype ?? "integer", lexical, parse(input));
};

const checkGrammar = (lit: Literal): Either<Err.Cause, Literal> =>
	F.pipe(
		lit.lexical,
		O.match(
			(): Either<Err.Cause, Literal> => E.right(lit),
			// surrounding whitespace collapses, as in `fromText`
			text => (G.matches(lit.datatype, text.trim()) ? E.right(lit) : E.left(Err.GrammarMismatch(lit.datatype, text))),
		),
	);

const checkDomain = (lit: Literal, value: bigint): Either<Err.Cause, Literal> =>
	DT.inDomain(lit.datatype, value) ? E.right(lit) : E.left(Err.DomainViolation(lit.datatype, value, DT.domainOf(lit.datatype)));

/**
 * Checks the cached text against the datatype's grammar and the value against
 * its domain. A literal whose value could not be parsed passes as is.
 */
export const validate = (lit: Literal): Either<Err.Cause, Literal> =>
	Log.scoped("validate", () =>
		F.pipe(
			lit.value,
			O.match(
				(): Either<Err.Cause, Literal> => E.right(lit),
				value =>
					F.pipe(
						checkGrammar(lit),
						E.chain(l => checkDomain(l, value)),
						E.mapLeft(e => {
							Log.logger.debug(`${display(lit)}: ${Err.display(e)}`);
							return e;
						}),
					),
			),
		),
	);

export const isValid = (lit: Literal): boolean => O.isSome(lit.value) && E.isRight(validate(lit));

/** `make` followed by the active policy: strict validates, permissive accepts everything. */
export const construct = (input: Input, options: Options = {}): Either<Err.Cause, Literal> => {
	const lit = make(input, options);
	const policy = options.policy ?? config.policy;
	const checked = policy === "strict" ? validate(lit) : E.right(lit);
	return options.canonical ? E.map(canonicalize)(checked) : checked;
};
