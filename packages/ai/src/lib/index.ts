export * from "./ai-clients";
