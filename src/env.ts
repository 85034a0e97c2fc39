import { config as loadDotenv } from "dotenv";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Imported ahead of the logger, whose level and transport come from the environment
loadDotenv({ path: join(__dirname, "..", ".env") });
