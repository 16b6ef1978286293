import path from "path";
import { getModel, type AppConfig, type ModelChoice } from "../config";
import { ApiWhisperEngine } from "./api-engine";
import { LocalWhisperEngine } from "./local-engine";
import type { SttEngine } from "./types";

export type { EngineInput, EngineOutput, SttEngine } from "./types";
export { ApiWhisperEngine } from "./api-engine";
export { LocalWhisperEngine } from "./local-engine";

export function createEngine(choice: ModelChoice, config: AppConfig): SttEngine {
  const selected = getModel(choice);
  if (selected.kind === "api") {
    return new ApiWhisperEngine({
      model: selected.choice,
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl,
    });
  }
  return new LocalWhisperEngine({
    binPath: config.whisperCppPath,
    modelPath: path.join(config.whisperModelDir, selected.file),
  });
}
