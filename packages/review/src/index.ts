export * from "./tags";
export * from "./verdict-parser";
export * from "./suggestion-parser";
export * from "./workspace";
export * from "./similarity";
export * from "./patcher";
export * from "./prompts";
export * from "./comments";
export * from "./state-machine";
