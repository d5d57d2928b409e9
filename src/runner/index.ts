export * from "./optimizer-runner";
