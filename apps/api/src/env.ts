import dotenv from "dotenv";
import path from "path";
import fs from "fs";

// Imported first by the entry point: core loggers read LOG_LEVEL/LOG_FORMAT at load.
// Repo root .env first, then app-local overrides.
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();
