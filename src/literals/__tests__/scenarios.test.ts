import { describe, it, expect } from "vitest";
import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as F from "fp-ts/function";

import * as L from "@xsd/literals";
import { unwrap } from "./helpers";

describe("scenarios", () => {
	it("stepping 40 up twice gives the value of 42", () => {
		const result = F.pipe(L.successor(L.make(40)), E.chain(L.successor));
		expect(unwrap(result).value).toEqual(L.make(42).value);
	});

	it("007 parses to 7 and canonicalizes to 7", () => {
		const lit = L.make("007");
		expect(lit.value).toEqual(O.some(7n));
		expect(L.toText(L.canonicalize(lit))).toBe("7");
	});

	it("-5 as a negativeInteger matches its grammar and has absolute value 5", () => {
		const lit = unwrap(L.construct(-5, { datatype: "negativeInteger" }));
		expect(L.Grammar.matches("negativeInteger", L.toText(lit))).toBe(true);

		const abs = unwrap(L.absoluteValue(lit));
		expect(abs).not.toBe(lit);
		expect(abs.value).toEqual(O.some(5n));
	});

	it("abc constructs without a value and the zero test fails", () => {
		const lit = unwrap(L.construct("abc"));
		expect(lit.value).toEqual(O.none);
		expect(L.isZero(lit)).toEqual(E.left(L.Err.ValueAbsent(lit)));
	});

	describe("0 as a positiveInteger", () => {
		it("is a domain violation under the strict policy", () => {
			expect(L.construct(0, { datatype: "positiveInteger" })).toEqual(E.left(L.Err.DomainViolation("positiveInteger", 0n, { min: 1n })));
		});

		it("is accepted under the permissive policy", () => {
			const lit = unwrap(L.construct(0, { datatype: "positiveInteger", policy: "permissive" }));
			expect(lit.datatype).toBe("positiveInteger");
			expect(lit.value).toEqual(O.some(0n));
		});
	});

	it("every variant round-trips a value of its own domain", () => {
		const samples: Record<L.Datatype, string> = {
			integer: "-00123",
			nonPositiveInteger: "-0",
			negativeInteger: "-017",
			long: "+9223372036854775807",
			int: "-2147483648",
			short: "0032767",
			byte: "-128",
			nonNegativeInteger: "+0",
			unsignedLong: "18446744073709551615",
			unsignedInt: "004294967295",
			unsignedShort: "65535",
			unsignedByte: "255",
			positiveInteger: "+1",
		};
		L.Datatypes.all.forEach(datatype => {
			const text = samples[datatype];
			const lit = unwrap(L.construct(text, { datatype }));
			const again = unwrap(L.construct(L.toText(L.canonicalize(lit)), { datatype }));
			expect(again.value, datatype).toEqual(L.parse(text));
		});
	});
});
