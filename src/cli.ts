#!/usr/bin/env node
/**
 * Worldsmith CLI
 *
 * Usage:
 *   worldsmith generate --config world.json
 *   worldsmith next-chapter --story my_world
 *   worldsmith validate --story my_world
 *
 * Provider credentials are read from ANTHROPIC_API_KEY or OPENAI_API_KEY,
 * matching the provider named by the config.
 */

import "dotenv/config";
import fs from "fs/promises";
import { Command } from "commander";
import chalk from "chalk";
import { getConfig, setConfig } from "#worldsmith/config.js";
import { WorldConfigError } from "#worldsmith/ai/error.js";
import { WorldGenerator, parseWorldConfig } from "#worldsmith/ai/worldgen/world-generator.js";
import { GenerationReport, ReportEntry, countBySeverity, formatReportEntry } from "#worldsmith/ai/worldgen/report.js";
import { ProviderName } from "#worldsmith/ai/worldgen/schemas.js";
import { validateContent } from "#worldsmith/ai/worldgen/graphs/generation-graph/nodes/validate-content/index.js";

const CREDENTIAL_ENV: Record<ProviderName, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

function credentialFor(provider: ProviderName): string {
  const envName = CREDENTIAL_ENV[provider];
  const credential = process.env[envName];
  if (!credential) {
    throw new WorldConfigError(`${envName} is not set`);
  }
  return credential;
}

function createGenerator(): WorldGenerator {
  return new WorldGenerator({
    observer: {
      onProgress: (progress) => console.log(chalk.gray(`  progress ${Math.round(progress * 100)}%`)),
      onChapterOutline: (outline) => console.log(chalk.cyan(`  outline ${outline.chapterId}: ${outline.chapterName}`)),
      onChapterGenerated: (chapter) => console.log(chalk.green(`  generated ${chapter.chapterId}`)),
      onError: (message) => console.error(chalk.yellow(`  ${message}`)),
    },
  });
}

/** Cancels the active run on the first Ctrl-C; a second one exits. */
function cancelOnInterrupt(generator: WorldGenerator): () => void {
  const onInterrupt = () => {
    if (generator.cancel()) {
      console.log(chalk.yellow("\nCancelling after the current request... (Ctrl-C again to quit)"));
      process.once("SIGINT", () => process.exit(130));
    }
  };
  process.once("SIGINT", onInterrupt);
  return () => process.removeListener("SIGINT", onInterrupt);
}

function printEntries(entries: ReportEntry[]): void {
  for (const entry of entries) {
    const line = formatReportEntry(entry);
    console.log(entry.severity === "error" ? chalk.red(line) : chalk.yellow(line));
  }
}

function printReport(report: GenerationReport): void {
  console.log();
  if (report.status === "completed") {
    console.log(chalk.green.bold(`✓ Story ${report.storyId} generated`));
  } else {
    console.log(chalk.red.bold(`✗ Generation aborted: ${report.abortReason ?? "unknown reason"}`));
  }
  console.log(chalk.gray(`  chapters: ${report.chapterIds.join(", ") || "none"}`));
  console.log(
    chalk.gray(
      `  rooms ${report.counts.rooms}, quests ${report.counts.quests}, ` +
        `enemies ${report.counts.enemies}, items ${report.counts.items}`
    )
  );
  console.log(chalk.gray(`  tokens used: ${report.tokensUsed}`));
  if (report.outputPath) console.log(chalk.gray(`  saved to: ${report.outputPath}`));

  if (report.entries.length > 0) {
    console.log();
    console.log(chalk.bold(`Report (${report.errorCount} error(s), ${report.warningCount} warning(s)):`));
    printEntries(report.entries);
  }
}

async function readConfigFile(file: string): Promise<unknown> {
  const text = await fs.readFile(file, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new WorldConfigError(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function fail(error: unknown): never {
  if (error instanceof WorldConfigError) {
    console.error(chalk.red(`✗ ${error.message}`));
    for (const issue of error.issues) console.error(chalk.red(`  - ${issue}`));
  } else {
    console.error(chalk.red("✗ Error:"), error instanceof Error ? error.message : error);
  }
  process.exit(1);
}

const program = new Command();

program
  .name("worldsmith")
  .description("Generate text adventure worlds with a language model")
  .version("0.1.0")
  .option("-o, --output <dir>", "story output directory", getConfig("output-dir"))
  .hook("preAction", (command) => {
    const { output } = command.opts<{ output: string }>();
    setConfig("output-dir", output);
  });

program
  .command("generate")
  .description("Generate a new story from a world config file")
  .requiredOption("-c, --config <file>", "world generation config (JSON)")
  .action(async (options: { config: string }) => {
    try {
      const config = parseWorldConfig(await readConfigFile(options.config));
      const credential = credentialFor(config.provider.provider);
      const generator = createGenerator();

      console.log(chalk.blue(`Generating world from ${options.config}...`));
      const release = cancelOnInterrupt(generator);
      const report = await generator.startGeneration(config, credential);
      release();

      printReport(report);
      process.exitCode = report.status === "completed" ? 0 : 1;
    } catch (error) {
      fail(error);
    }
  });

program
  .command("next-chapter")
  .description("Append one chapter to an existing story")
  .requiredOption("-s, --story <id>", "story id")
  .action(async (options: { story: string }) => {
    try {
      const generator = createGenerator();
      const manifest = await generator.store.loadManifest(options.story);
      const credential = credentialFor(manifest.provider.provider);

      console.log(chalk.blue(`Generating chapter ${manifest.chapterIds.length + 1} of ${options.story}...`));
      const release = cancelOnInterrupt(generator);
      const report = await generator.generateNextChapter(credential, options.story);
      release();

      printReport(report);
      process.exitCode = report.status === "completed" ? 0 : 1;
    } catch (error) {
      fail(error);
    }
  });

program
  .command("validate")
  .description("Re-run validation and integrity checks over a saved story")
  .requiredOption("-s, --story <id>", "story id")
  .action(async (options: { story: string }) => {
    try {
      const generator = createGenerator();
      const manifest = await generator.store.loadManifest(options.story);
      const { artifacts, missing } = await generator.store.loadArtifacts(manifest);

      for (const id of missing) console.log(chalk.yellow(`[warning] missing file for ${id}`));
      const { entries, summary } = validateContent(artifacts);
      console.log(summary);
      printEntries(entries);

      const { errorCount } = countBySeverity(entries);
      process.exitCode = errorCount === 0 && missing.length === 0 ? 0 : 1;
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
