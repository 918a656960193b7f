import { writeFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { buildSampleDocument } from "@scripture-refs/docx";

const target = path.resolve(process.argv[2] ?? "sample-citations.docx");

await writeFile(target, await buildSampleDocument());
console.log(`Sample document created: ${target}`);
