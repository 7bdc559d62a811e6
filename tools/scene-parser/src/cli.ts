/**
 * Scene Parser CLI: dumps the IR of .nex scene files as JSON.
 *
 * Usage:
 *   nex-parse --input <file.nex> [--output <file.json>]
 *   nex-parse --dir <dir> --output <dir> [--report <file>] [--stats]
 *
 * Options:
 *   --input    Path to a single .nex file (IR goes to stdout without --output)
 *   --output   Output JSON file or directory
 *   --dir      Process all .nex files in a directory (recursive)
 *   --stats    Print summary statistics
 *   --report   Write a parse report JSON file
 *   --help     Show this help message
 */

import { mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { dirname, extname, join, relative, resolve } from 'node:path';

import { sha256Hex } from '@nex/assets';
import {
  SCENE_FILE_EXTENSION,
  describeError,
  loadSourceFile,
  parseScene,
  sceneGraphToJSON,
  type SceneGraphJSON,
} from '@nex/core';

export interface SceneParserIo {
  print(text: string): void;
  printError(text: string): void;
}

interface CliArgs {
  input: string | undefined;
  output: string | undefined;
  dir: string | undefined;
  stats: boolean;
  report: string | undefined;
}

type ParsedCliArgs =
  | { kind: 'run'; args: CliArgs }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

interface ParsedFileResult {
  readonly inputPath: string;
  readonly outputPath: string | null;
  readonly graph: SceneGraphJSON;
  readonly sourceHash: string;
}

export interface SceneParserReport {
  generatedAt: string;
  mode: 'single' | 'directory';
  sourcePath: string;
  outputPath: string;
  files: {
    inputPath: string;
    outputPath: string | null;
    objects: number;
    assets: number;
    sourceHash: string;
  }[];
  failures: {
    inputPath: string;
    message: string;
  }[];
}

// ============================================================================
// Argument parsing
// ============================================================================

function parseArgs(argv: readonly string[]): ParsedCliArgs {
  const args: CliArgs = {
    input: undefined,
    output: undefined,
    dir: undefined,
    stats: false,
    report: undefined,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
      case '-i':
      case '--output':
      case '-o':
      case '--dir':
      case '-d':
      case '--report': {
        const value = argv[++i];
        if (!value) {
          return { kind: 'error', message: `${arg} requires a value` };
        }
        if (arg === '--input' || arg === '-i') {
          args.input = value;
        } else if (arg === '--output' || arg === '-o') {
          args.output = value;
        } else if (arg === '--dir' || arg === '-d') {
          args.dir = value;
        } else {
          args.report = value;
        }
        break;
      }
      case '--stats':
        args.stats = true;
        break;
      case '--help':
      case '-h':
        return { kind: 'help' };
      default:
        return { kind: 'error', message: `Unknown argument: ${arg}` };
    }
  }

  if (!args.input && !args.dir) {
    return { kind: 'error', message: '--input or --dir is required' };
  }
  if (args.input && args.dir) {
    return { kind: 'error', message: '--input and --dir cannot be combined' };
  }
  if (args.dir && !args.output) {
    return { kind: 'error', message: '--output is required with --dir' };
  }
  return { kind: 'run', args };
}

export const SCENE_PARSER_USAGE = `
Scene Parser: @nex/tool-scene-parser

Usage:
  nex-parse --input <file.nex> [--output <file.json>]
  nex-parse --dir <dir> --output <dir> [--report <file>] [--stats]

Options:
  --input,    -i   Path to a single .nex file (IR goes to stdout without --output)
  --output,   -o   Output JSON file or directory
  --dir,      -d   Process all .nex files in a directory (recursive)
  --stats          Print summary statistics
  --report         Write a parse report JSON file
  --help,     -h   Show this help message
`.trim();

// ---------------------------------------------------------------------------
// File helpers
// ---------------------------------------------------------------------------

function findSceneFiles(dir: string): string[] {
  const results: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...findSceneFiles(fullPath));
    } else if (extname(entry.name).toLowerCase() === SCENE_FILE_EXTENSION) {
      results.push(fullPath);
    }
  }
  return results.sort();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Serialize to deterministic JSON with sorted object keys. */
export function toSortedJson(value: unknown): string {
  return JSON.stringify(value, (_key: string, fieldValue: unknown) => {
    if (!isRecord(fieldValue)) {
      return fieldValue;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(fieldValue).sort()) {
      sorted[key] = fieldValue[key];
    }
    return sorted;
  }, 2);
}

// ---------------------------------------------------------------------------
// Single file processing
// ---------------------------------------------------------------------------

async function processFile(inputPath: string, outputPath: string | null): Promise<ParsedFileResult> {
  const source = await loadSourceFile(inputPath);
  const graph = sceneGraphToJSON(parseScene(source, { filePath: inputPath }));

  if (outputPath) {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, toSortedJson(graph) + '\n');
  }

  return { inputPath, outputPath, graph, sourceHash: sha256Hex(source) };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/** Run the tool and return its exit code: 1 when any file fails to parse. */
export async function runSceneParserCli(argv: readonly string[], io: SceneParserIo): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.kind === 'help') {
    io.print(SCENE_PARSER_USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    io.printError(`Error: ${parsed.message}\n`);
    io.printError(SCENE_PARSER_USAGE);
    return 1;
  }

  const { args } = parsed;
  const results: ParsedFileResult[] = [];
  const failures: SceneParserReport['failures'] = [];

  const tryProcess = async (inputPath: string, outputPath: string | null): Promise<ParsedFileResult | null> => {
    try {
      const result = await processFile(inputPath, outputPath);
      results.push(result);
      return result;
    } catch (error) {
      const message = describeError(error);
      failures.push({ inputPath, message });
      io.printError(`[ERROR] ${message}`);
      return null;
    }
  };

  if (args.input) {
    // Single file mode
    const inputPath = resolve(args.input);
    const outputPath = args.output ? resolve(args.output) : null;
    const result = await tryProcess(inputPath, outputPath);
    if (result && outputPath) {
      io.print(`${inputPath} → ${outputPath} (${result.graph.objects.length} object(s), ${result.graph.assets.length} asset(s))`);
    } else if (result) {
      io.print(toSortedJson(result.graph));
    }
  } else if (args.dir && args.output) {
    // Directory mode
    const dirPath = resolve(args.dir);
    const outputDir = resolve(args.output);

    let sceneFiles: string[];
    try {
      sceneFiles = findSceneFiles(dirPath);
    } catch (error) {
      io.printError(`[ERROR] ${describeError(error)}`);
      return 1;
    }
    io.print(`Found ${sceneFiles.length} ${SCENE_FILE_EXTENSION} file(s) in ${dirPath}`);

    for (const file of sceneFiles) {
      const relPath = relative(dirPath, file);
      const outPath = join(outputDir, relPath.replace(/\.nex$/i, '.json'));
      await tryProcess(file, outPath);
    }

    io.print(`Processed ${results.length} file(s) → ${outputDir}`);
  }

  if (args.stats || failures.length > 0) {
    const objects = results.reduce((sum, result) => sum + result.graph.objects.length, 0);
    const assets = results.reduce((sum, result) => sum + result.graph.assets.length, 0);
    io.print('Summary:');
    io.print(`  Files:    ${results.length}`);
    io.print(`  Objects:  ${objects}`);
    io.print(`  Assets:   ${assets}`);
    io.print(`  Failures: ${failures.length}`);
  }

  if (args.report) {
    const report: SceneParserReport = {
      generatedAt: new Date().toISOString(),
      mode: args.input ? 'single' : 'directory',
      sourcePath: args.input ?? args.dir ?? '',
      outputPath: args.output ?? '',
      files: results.map((result) => ({
        inputPath: result.inputPath,
        outputPath: result.outputPath,
        objects: result.graph.objects.length,
        assets: result.graph.assets.length,
        sourceHash: result.sourceHash,
      })),
      failures,
    };
    writeFileSync(args.report, toSortedJson(report) + '\n');
    io.print(`Parse report written to ${args.report}`);
  }

  return failures.length > 0 ? 1 : 0;
}
