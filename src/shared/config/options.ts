export type Policy = "strict" | "permissive";

export const options: { verbose: boolean; policy: Policy } = {
	verbose: false,
	policy: "strict",
};

export const reset = () => {
	options.verbose = false;
	options.policy = "strict";
};
