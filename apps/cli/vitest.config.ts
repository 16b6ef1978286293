import { defineConfig } from "vitest/config";
import { sharedConfig } from "../../vitest.shared";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
    // SQLite and temp-file tests share the process; keep them in one worker
    fileParallelism: false,
  },
});
