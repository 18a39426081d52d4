export * from "./types";
export * from "./escape";
export * from "./segment";
export * from "./format";
export * from "./text";
export * from "./blocks";
export * from "./page";
