import dotenv from "dotenv";
import { buildProgram } from "./program";

dotenv.config();

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Error in CLI:", error);
  process.exit(1);
});
