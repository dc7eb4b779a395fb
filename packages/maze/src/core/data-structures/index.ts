export * from "./frontier-queue";
export * from "./visited-matrix";
