#!/usr/bin/env node

import { Command } from "commander";
import { createTreeCommand } from "./commands/tree.js";
import chalk from "chalk";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

// Get package.json info
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "../../package.json"), "utf-8"),
);

// Create main program
const program = new Command()
  .name("apt-dep-tree")
  .description("CLI tool for visualizing dependencies in Debian package indexes")
  .version(packageJson.version)
  .addHelpText(
    "after",
    `
${chalk.gray("Examples:")}
  $ apt-dep-tree tree bash --repo ./Packages --test
  $ apt-dep-tree tree curl --repo http://deb.debian.org/debian/dists/stable/main/binary-amd64
  $ apt-dep-tree tree libc6 --repo ./Packages --test --filter gcc
  $ apt-dep-tree tree coreutils --repo ./Packages --test --output json

${chalk.gray("Environment Variables:")}
  APT_REPO_PATH    Default path to a local Packages file
`,
  );

// Add commands
program.addCommand(createTreeCommand());

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
