import { describe, it, expect } from "vitest";

import * as Err from "../errors";
import { make } from "../lexical";

describe("errors: display", () => {
	it("ValueAbsent", () => {
		expect(Err.display(Err.ValueAbsent(make("abc", { datatype: "short" })))).toBe('Value Absent: "abc"^^xsd:short has no integer value');
	});

	it("DomainViolation", () => {
		expect(Err.display(Err.DomainViolation("byte", 200n, { min: -128n, max: 127n }))).toBe("Domain Violation: 200 is outside xsd:byte [-128, 127]");
	});

	it("GrammarMismatch", () => {
		expect(Err.display(Err.GrammarMismatch("unsignedLong", "+5"))).toBe('Grammar Mismatch: "+5" is not a lexical form of xsd:unsignedLong');
	});

	it("UnknownDatatype", () => {
		expect(Err.display(Err.UnknownDatatype("xsd:float"))).toBe("Unknown Datatype: xsd:float");
	});

	it("CapabilityUnavailable", () => {
		expect(Err.display(Err.CapabilityUnavailable("big-integer"))).toBe("Capability Unavailable: no big-integer provider is registered");
	});

	it("BackingFailure", () => {
		expect(Err.display(Err.BackingFailure("native", "twelve", "bad digits"))).toBe('Backing Failure: native rejected "twelve": bad digits');
	});

	it("shows open bounds", () => {
		expect(Err.displayDomain({})).toBe("[-inf, +inf]");
		expect(Err.displayDomain({ min: 1n })).toBe("[1, +inf]");
		expect(Err.displayDomain({ max: 0n })).toBe("[-inf, 0]");
	});
});
