import { config } from "dotenv";
import { run } from "./cli";

// Load environment variables
config();

process.exitCode = run(process.argv.slice(2));
