import { Command } from "commander";
import chalk from "chalk";
import { loadPackagesIndex } from "../../core/packages-index.js";
import {
  TreeUsecase,
  isOutputFormat,
  OUTPUT_FORMATS,
} from "../../usecases/tree.usecase.js";

interface TreeCommandOptions {
  repo?: string;
  test?: boolean;
  filter: string;
  output: string;
  color: boolean;
}

export function createTreeCommand(): Command {
  const command = new Command("tree")
    .alias("deps")
    .description("Print the dependency tree of a package from a package index")
    .argument("<package>", 'Root package name (e.g., "bash")')
    .option(
      "-r, --repo <location>",
      "Packages file (with --test) or repository URL; /Packages is appended to URLs that lack it",
    )
    .option("-t, --test", "Read --repo as a local file instead of fetching it")
    .option(
      "-f, --filter <substring>",
      "Do not expand packages whose name contains this substring",
      "",
    )
    .option("-o, --output <format>", "Output format: tree, json, yaml", "tree")
    .option("--no-color", "Disable colored output")
    .action(async (packageName: string, options: TreeCommandOptions) => {
      try {
        const format = options.output;
        if (!isOutputFormat(format)) {
          throw new Error(
            `Unknown output format "${format}" (expected one of: ${OUTPUT_FORMATS.join(", ")})`,
          );
        }

        console.error(chalk.gray(`package=${packageName}`));
        console.error(
          chalk.gray(`repo=${options.repo ?? process.env.APT_REPO_PATH ?? ""}`),
        );
        console.error(chalk.gray(`testMode=${options.test === true}`));
        console.error(chalk.gray(`filter=${options.filter}`));

        const text = await loadPackagesIndex({
          repo: options.repo,
          local: options.test,
        });

        const usecase = TreeUsecase.fromControlText(text);

        console.error(
          chalk.gray(
            `Indexed ${usecase.packageCount} package(s), ${usecase.missingPackages().length} referenced but not defined`,
          ),
        );

        if (!usecase.packageExists(packageName)) {
          console.error(
            chalk.yellow(
              `Warning: Package "${packageName}" not listed in the index`,
            ),
          );
        }

        if (format === "tree") {
          console.error(chalk.gray("\n=== Dependency Tree ===\n"));
        }

        console.log(
          usecase.render(packageName, options.filter, format, options.color),
        );
      } catch (error) {
        console.error(
          chalk.red("Error:"),
          error instanceof Error ? error.message : String(error),
        );
        process.exit(1);
      }
    });

  return command;
}
