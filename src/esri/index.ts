export * from "./envelope";
export * from "./esriJson";
export * from "./layer";
export * from "./probe";
export * from "./query";
