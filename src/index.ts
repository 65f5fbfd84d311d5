export * as Literals from "./literals";
export * as Config from "./shared/config/options";
export { mkProgram } from "./cli/program";
export type { IO } from "./cli/program";
