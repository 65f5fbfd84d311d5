import { match } from "ts-pattern";

import type { Datatype, Domain } from "./datatypes";
import type { Literal } from "./literal";
import { display as displayLiteral } from "./literal";

export type Cause =
	| { type: "ValueAbsent"; literal: Literal }
	| { type: "DomainViolation"; datatype: Datatype; value: bigint; domain: Domain }
	| { type: "GrammarMismatch"; datatype: Datatype; lexical: string }
	| { type: "UnknownDatatype"; tag: string }
	| { type: "CapabilityUnavailable"; capability: string }
	| { type: "BackingFailure"; provider: string; text: string; reason: string };

export const ValueAbsent = (literal: Literal): Cause => ({ type: "ValueAbsent", literal });
export const DomainViolation = (datatype: Datatype, value: bigint, domain: Domain): Cause => ({ type: "DomainViolation", datatype, value, domain });
export const GrammarMismatch = (datatype: Datatype, lexical: string): Cause => ({ type: "GrammarMismatch", datatype, lexical });
export const UnknownDatatype = (tag: string): Cause => ({ type: "UnknownDatatype", tag });
export const CapabilityUnavailable = (capability: string): Cause => ({ type: "CapabilityUnavailable", capability });
export const BackingFailure = (provider: string, text: string, reason: string): Cause => ({ type: "BackingFailure", provider, text, reason });

const bound = (b: bigint | undefined, open: string) => (b === undefined ? open : b.toString());

export const displayDomain = (domain: Domain): string => `[${bound(domain.min, "-inf")}, ${bound(domain.max, "+inf")}]`;

export const display = (error: Cause): string =>
	match(error)
		.with({ type: "ValueAbsent" }, ({ literal }) => `Value Absent: ${displayLiteral(literal)} has no integer value`)
		.with({ type: "DomainViolation" }, ({ datatype, value, domain }) => `Domain Violation: ${value} is outside xsd:${datatype} ${displayDomain(domain)}`)
		.with({ type: "GrammarMismatch" }, ({ datatype, lexical }) => `Grammar Mismatch: "${lexical}" is not a lexical form of xsd:${datatype}`)
		.with({ type: "UnknownDatatype" }, ({ tag }) => `Unknown Datatype: ${tag}`)
		.with({ type: "CapabilityUnavailable" }, ({ capability }) => `Capability Unavailable: no ${capability} provider is registered`)
		.with({ type: "BackingFailure" }, ({ provider, text, reason }) => `Backing Failure: ${provider} rejected "${text}": ${reason}`)
		.exhaustive();
