#!/usr/bin/env node

/**
 * CLI entry point for any2md
 * Handles command-line argument parsing and user interaction
 */

import { Command, Option } from "commander";
import { convertCommand, parseLogLevel } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("any2md")
  .description(
    "Convert PDF, PowerPoint, Word and text documents to Markdown, optionally only the ones that changed",
  )
  .version("1.0.0");

// Main conversion command (default action)
program
  .option("--source-dir <path>", "Directory containing source documents (default: source)")
  .option("--processed-dir <path>", "Directory for Markdown output (default: processed)")
  .option("--incremental", "Only convert new or changed documents")
  .option(
    "--log-level <level>",
    "Log level: debug, info, warn, error or silent (default: info)",
    parseLogLevel,
  )
  .option("--log-file <path>", "Also append log lines to this file")
  .option("--registry <path>", "Registry file (default: <processed-dir>/file_registry.json)")
  .addOption(
    new Option("--fingerprint <strategy>", "Change detection strategy").choices([
      "hash",
      "stat",
    ]),
  )
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "List failed files in the summary")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
