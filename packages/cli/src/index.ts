import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError } from "commander";
import {
  generateAst,
  renderTree,
  type GenerateOptions,
  type PatternMismatchError,
} from "@helena/ast";
import { DEFAULT_CONFIG_NAME, loadConfig } from "@helena/config";
import { locate } from "@helena/lexer";
import type { AstNode } from "@helena/syntax";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliOptions {
  cwd?: string;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

interface GlobalOptions {
  config?: string;
  pretty: string;
}

type CommandName = "tree" | "parse";

interface ExecuteOptions {
  cwd: string;
  stdout: OutputStream;
  stderr: OutputStream;
}

interface SourceTarget {
  filePath: string;
  generate: GenerateOptions;
}

export async function run(
  args: string[],
  options: CliOptions = {}
): Promise<number> {
  const exec: ExecuteOptions = {
    cwd: options.cwd ?? process.cwd(),
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
  };
  let exitCode = 0;

  const program = new Command();

  program
    .name("helena-ast")
    .version("0.1.0")
    .description("Builds abstract syntax trees of Helena sources")
    .option("-c, --config <path>", `Path to ${DEFAULT_CONFIG_NAME} config file`)
    .option(
      "-p, --pretty <n>",
      "Pretty-print JSON output with <n> spaces",
      "2"
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => exec.stdout.write(text),
      writeErr: (text) => exec.stderr.write(text),
    });

  program
    .command("tree [file]")
    .description("Print the tree of every top-level declaration")
    .action((file: string | undefined) => {
      exitCode = executeCommand(
        "tree",
        file,
        program.opts<GlobalOptions>(),
        exec
      );
    });

  program
    .command("parse [file]")
    .description("Print the top-level declarations as JSON")
    .action((file: string | undefined) => {
      exitCode = executeCommand(
        "parse",
        file,
        program.opts<GlobalOptions>(),
        exec
      );
    });

  try {
    await program.parseAsync(args, { from: "user" });
    return exitCode;
  } catch (error) {
    // Commander has already written its own usage errors, help and version.
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    exec.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

function executeCommand(
  command: CommandName,
  file: string | undefined,
  globals: GlobalOptions,
  exec: ExecuteOptions
): number {
  const { stdout, stderr } = exec;

  let target: SourceTarget;
  try {
    target = resolveTarget(file, globals.config, exec.cwd);
  } catch (error) {
    stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  let source: string;
  try {
    source = fs.readFileSync(target.filePath, "utf8");
  } catch (error) {
    stderr.write(
      `Cannot read ${target.filePath}: ${error instanceof Error ? error.message : String(error)}\n`
    );
    return 1;
  }

  const result = generateAst(source, target.generate);
  if (!result.ok) {
    formatAndWriteError(result.error, target.filePath, source, stderr);
    return 1;
  }

  if (command === "tree") {
    stdout.write(`${renderRoots(result.value)}\n`);
    return 0;
  }

  const pretty = Math.max(0, Number.parseInt(globals.pretty, 10) || 0);
  stdout.write(`${JSON.stringify(result.value, null, pretty)}\n`);
  return 0;
}

/**
 * Picks the file to build and the options to build it with. A file named on
 * the command line may be built without any config; otherwise the config's
 * source is built.
 */
function resolveTarget(
  file: string | undefined,
  configPath: string | undefined,
  cwd: string
): SourceTarget {
  const hasConfig =
    configPath !== undefined ||
    fs.existsSync(path.join(cwd, DEFAULT_CONFIG_NAME));

  if (file !== undefined && !hasConfig) {
    return { filePath: path.resolve(cwd, file), generate: {} };
  }

  const config = loadConfig({ cwd, path: configPath });
  return {
    filePath: file !== undefined ? path.resolve(cwd, file) : config.srcPath,
    generate: { newline: config.newline, maxLeafing: config.maxLeafing },
  };
}

function renderRoots(roots: AstNode[]): string {
  return roots.map((root) => renderTree(root)).join("\n");
}

function formatAndWriteError(
  error: PatternMismatchError,
  filePath: string,
  source: string,
  stderr: OutputStream
): void {
  if (error.offset === undefined) {
    stderr.write(`${filePath}: error: ${error.message}\n`);
    return;
  }

  const { column, row } = locate(source, error.offset);
  const line = source.split(/\r?\n/)[column - 1] ?? "";

  stderr.write(`${filePath}:${column}:${row + 1}: error: ${error.message}\n`);
  stderr.write(`${line}\n`);
  stderr.write(`${" ".repeat(row)}^\n`);
}
