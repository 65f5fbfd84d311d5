export * from "./literal";
export * from "./lexical";
export * from "./canonical";
export * from "./operations";
export * from "./backing";

export type { Datatype, Domain } from "./datatypes";
export * as Datatypes from "./datatypes";
export * as Grammar from "./grammar";
export * as Err from "./errors";
