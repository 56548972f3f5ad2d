#!/usr/bin/env node

import "dotenv/config";
import * as readline from "node:readline/promises";
import { runTokenSetup } from "./auth/token-setup.js";

async function main(): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let code: number;
  try {
    code = await runTokenSetup(process.argv.slice(2), {
      question: (prompt) => rl.question(prompt),
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    });
  } finally {
    rl.close();
  }
  process.exit(code);
}

void main();
