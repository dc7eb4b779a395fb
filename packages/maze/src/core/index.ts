/**
 * Core module - grid, geometry and supporting data structures.
 */

export * from "./algorithms";
export * from "./data-structures";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
