/**
 * percent/mod.ts
 * Barrel exports for the percent-script codec and the notebook adapter.
 */

export * from "../notebook/cells.ts";
export * from "../notebook/ipynb.ts";
export * from "./cli.ts";
export * from "./convert.ts";
export * from "./decode.ts";
export * from "./encode.ts";
export * from "./grammar.ts";
export * from "./issues.ts";
