export * from "./crawler";
export * from "./types";
