import { Command } from "commander";
import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import * as O from "fp-ts/Option";

import * as L from "@xsd/literals";
import { options } from "@xsd/shared/config/options";
import * as Log from "@xsd/shared/logging";

export type IO = {
	out: (line: string) => void;
	err: (text: string) => void;
};

const stdio: IO = {
	out: line => console.log(line),
	err: text => process.stderr.write(text),
};

type LiteralOpts = { datatype: string };

export const mkProgram = (io: IO = stdio): Command => {
	const program = new Command();

	const fail = (cause: L.Err.Cause): never => program.error(L.Err.display(cause), { exitCode: 1 });

	const literal = (lexical: string, opts: LiteralOpts) =>
		F.pipe(
			L.Datatypes.resolve(opts.datatype),
			E.chain(datatype => L.construct(lexical, { datatype })),
			E.chain(lit => (O.isSome(lit.value) ? E.right(lit) : E.left(L.Err.ValueAbsent(lit)))),
		);

	program
		.name("xsd-int")
		.description("Inspect XML Schema integer literals")
		.option("--verbose", "Enable debug logging")
		.option("--permissive", "Skip grammar and domain checks")
		.configureOutput({ writeOut: str => io.out(str.trimEnd()), writeErr: io.err })
		.hook("preAction", cmd => {
			const opts = cmd.opts<{ verbose?: boolean; permissive?: boolean }>();
			options.verbose = opts.verbose ?? false;
			options.policy = opts.permissive ? "permissive" : "strict";
			Log.setVerbose(options.verbose);
		});

	program
		.command("canonical")
		.argument("<lexical>", "Lexical form to canonicalize")
		.option("-d, --datatype <name>", "Datatype name or IRI", "integer")
		.description("Print the canonical form of a literal")
		.action((lexical: string, opts: LiteralOpts) =>
			F.pipe(
				literal(lexical, opts),
				E.map(L.canonicalize),
				E.match(fail, lit => io.out(L.toText(lit))),
			),
		);

	program
		.command("check")
		.argument("<lexical>", "Lexical form to check")
		.option("-d, --datatype <name>", "Datatype name or IRI", "integer")
		.description("Check a literal against its datatype's grammar and domain")
		.action((lexical: string, opts: LiteralOpts) =>
			F.pipe(
				literal(lexical, opts),
				E.chain(L.validate),
				E.match(fail, () => io.out("valid")),
			),
		);

	program
		.command("datatypes")
		.description("List the integer datatypes with their parent and domain")
		.action(() =>
			L.Datatypes.all.forEach(dt => {
				const parent = F.pipe(
					L.Datatypes.parent(dt),
					O.getOrElse<string>(() => "-"),
				);
				io.out(`${dt}\t${parent}\t${L.Err.displayDomain(L.Datatypes.domainOf(dt))}`);
			}),
		);

	return program;
};
