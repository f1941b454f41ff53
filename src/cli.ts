#!/usr/bin/env node
import { RecentFolders } from "./recent-folders.js";

async function main(): Promise<void> {
  const app = new RecentFolders();
  try {
    process.exitCode = await app.run();
  } catch (err) {
    app.log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

await main();
