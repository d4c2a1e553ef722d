export * from "./label";
export * from "./scenario";
export * from "./review";
export * from "./test-result";
export * from "./merge-request";
export * from "./outcome";
