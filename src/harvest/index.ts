export * from "./classify";
export * from "./errors";
export * from "./harvester";
export * from "./merger";
export * from "./orchestrator";
export * from "./planner";
export * from "./requestLog";
