export * from "./backtracker";
