#!/usr/bin/env node
import { cfgFromEnv, resolvePath } from "../packages/case-triage-mcp/src/config.js";
import { describeError } from "../packages/case-triage-mcp/src/errors.js";
import { syncPromptConfig } from "../packages/case-triage-mcp/src/prompt/prompt_config.js";

async function main(): Promise<number> {
  const [referenceArg, configArg] = process.argv.slice(2);
  if (referenceArg === "-h" || referenceArg === "--help") {
    console.error("Usage: sync_prompt_config.ts [referenceDir] [configPath]");
    return 1;
  }
  try {
    const cfg = cfgFromEnv();
    const referenceDir = resolvePath(cfg.repoRoot, referenceArg || cfg.defaultReferenceDir);
    const configPath = resolvePath(cfg.repoRoot, configArg || cfg.defaultPromptConfig);
    const synced = await syncPromptConfig(referenceDir, configPath);
    console.log(
      `${synced.created ? "Created" : "Updated"} ${synced.configPath} (template ${synced.templateChars} chars, condition ${synced.conditionChars} chars)`
    );
    return 0;
  } catch (err) {
    console.error(`Sync failed: ${describeError(err)}`);
    return 1;
  }
}

process.exit(await main());
