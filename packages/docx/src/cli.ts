import process from "node:process";
import { runCli } from "./lib/cli";

process.exitCode = await runCli(process.argv.slice(2), process.env);
