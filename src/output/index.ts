export * from "./bytes";
export * from "./combine";
export * from "./reader";
export * from "./writer";
