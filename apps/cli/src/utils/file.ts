import fs from "fs/promises";
import path from "path";
import type { z } from "zod";

export const readJSON = async <T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) => {
  if (!(await fileExists(file))) {
    return null;
  }

  const content = await fs.readFile(file, "utf8");
  return schema.parse(JSON.parse(content));
};

export const writeJSON = async <T>(file: string, data: T) => {
  // Ensure directory exists
  await fs.mkdir(path.dirname(file), { recursive: true });

  // Write JSON file
  await fs.writeFile(file, `${JSON.stringify(data, null, 2)}\n`);
};

export const readText = async (file: string) => {
  const content = await fs.readFile(file, "utf8");
  return content.replace(/^\uFEFF/, "");
};

export const fileExists = async (file: string) => {
  return fs
    .access(file)
    .then(() => true)
    .catch(() => false);
};
