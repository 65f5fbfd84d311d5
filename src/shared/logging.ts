import winston from "winston";

export const logFilePath = ".logs/debug.log";

const label = ["xsd"];

export const push = (l: string) => label.push(l);
export const pop = () => label.pop();
export const peek = () => label[label.length - 1];

export const logger = winston.createLogger({
	level: "info",
	transports: [
		new winston.transports.File({
			filename: logFilePath,
			format: winston.format.combine(
				winston.format.timestamp(),
				winston.format.printf(info => `${info.timestamp} ${info.level} [${label.join(".")}] ${String(info.message).replace(/\n/g, " ")}`),
			),
		}),
	],
});

export const setVerbose = (verbose: boolean) => {
	logger.level = verbose ? "debug" : "info";
};

/** Runs `fn` with `l` pushed onto the label stack. */
export const scoped = <A>(l: string, fn: () => A): A => {
	push(l);
	try {
		return fn();
	} finally {
		pop();
	}
};
