export * from "./breadth-first";
export * from "./distances";
export * from "./parent-map";
export * from "./reconstruct";
export * from "./solver";
export * from "./stepper";
