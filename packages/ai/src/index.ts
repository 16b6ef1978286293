export * from "./lib";
export * from "./transcribe/openai-transcribe";
export * from "./summarize/config";
export * from "./summarize/summarize";
export * from "./summarize/format";
