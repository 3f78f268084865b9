#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { loadConfig, type WordNetConfig } from "./config.js";
import { loadWordNet } from "./loader.js";
import { StructuredLogger } from "./logger.js";
import { describeLanguage, type Language } from "./model.js";
import { WordNetQuery, type GraphSummary } from "./query.js";

interface CliOptions {
  readonly file: string;
  readonly format: "text" | "json";
  readonly synsets: number[];
  readonly language?: Language;
  readonly relation?: number;
}

/** Everything the CLI prints, in both output formats. */
interface CliReport {
  readonly file: string;
  readonly summary: GraphSummary;
  readonly synsets: Array<{ id: number; simple: string }>;
  readonly language?: { language: Language; synsets: number };
  readonly relation?: { id: number; name: string | null; synsetRelations: number };
}

/** Output channel, swapped for an in-memory collector by the tests. */
type Print = (line: string) => void;

/** Runs the CLI and resolves with the process exit code. */
async function main(argv: string[], config: WordNetConfig, print: Print): Promise<number> {
  if (argv.length === 0 && config.sourcePath === null) {
    printUsage(print);
    return 1;
  }

  const options = parseArgs(argv, config.sourcePath);
  const logger = new StructuredLogger({ level: config.logLevel, logFile: config.logFile });
  try {
    const graph = await loadWordNet(options.file, {
      logger,
      chunkBytes: config.chunkBytes,
      progressInterval: config.progressInterval,
    });
    const report = buildReport(new WordNetQuery(graph), options);
    if (options.format === "json") {
      print(JSON.stringify(report, null, 2));
    } else {
      formatTextReport(report, print);
    }
    return 0;
  } finally {
    await logger.flush();
  }
}

function buildReport(query: WordNetQuery, options: CliOptions): CliReport {
  const synsets = options.synsets.map((id) => ({ id, simple: query.synsetToSimple(id) }));
  let report: CliReport = { file: options.file, summary: query.getMetadata(), synsets };

  if (options.language !== undefined) {
    const count = countItems(query.synsetsByLanguage(options.language));
    report = { ...report, language: { language: options.language, synsets: count } };
  }

  if (options.relation !== undefined) {
    const count = countItems(query.synsetRelationsByType(options.relation));
    const relationType = query.getRelationType(options.relation);
    report = {
      ...report,
      relation: { id: options.relation, name: relationType?.name ?? null, synsetRelations: count },
    };
  }
  return report;
}

function countItems(items: Iterable<unknown>): number {
  let count = 0;
  for (const _ of items) {
    count += 1;
  }
  return count;
}

function formatTextReport(report: CliReport, print: Print): void {
  const { summary } = report;
  print(`# ${report.file}`);
  print(`Owner: ${summary.owner}`);
  print(`Date: ${summary.date}`);
  print(`Version: ${summary.version}`);
  print(`Lexical units: ${summary.lexicalUnits}`);
  print(`Synsets: ${summary.synsets}`);
  print(`Relation types: ${summary.relationTypes}`);
  print(`Lexical relations: ${summary.lexicalRelations}`);
  print(`Synset relations: ${summary.synsetRelations}`);
  for (const synset of report.synsets) {
    print(`Synset ${synset.id}: ${synset.simple}`);
  }
  if (report.language) {
    print(`${describeLanguage(report.language.language)} synsets: ${report.language.synsets}`);
  }
  if (report.relation) {
    const label = report.relation.name === null ? "" : ` (${report.relation.name})`;
    print(`Synset relations of type ${report.relation.id}${label}: ${report.relation.synsetRelations}`);
  }
}

function parseArgs(argv: string[], defaultFile: string | null): CliOptions {
  let file = defaultFile;
  let rest = argv;
  const [first] = argv;
  if (first !== undefined && !first.startsWith("--")) {
    file = first;
    rest = argv.slice(1);
  }
  if (file === null) {
    throw new Error("First positional argument must be the path to a plWordNet XML file");
  }

  let format: "text" | "json" = "text";
  const synsets: number[] = [];
  let language: Language | undefined;
  let relation: number | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--synset":
        synsets.push(parseIdArgument(token, rest[++i]));
        break;
      case "--lang": {
        const value = rest[++i];
        if (value !== "pl" && value !== "en") {
          throw new Error("--lang must be 'pl' or 'en'");
        }
        language = value;
        break;
      }
      case "--relation":
        relation = parseIdArgument(token, rest[++i]);
        break;
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      default:
        throw new Error(`Unknown argument '${token}'`);
    }
  }

  return {
    file,
    format,
    synsets,
    ...(language === undefined ? {} : { language }),
    ...(relation === undefined ? {} : { relation }),
  };
}

function parseIdArgument(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`${flag} expects a numeric id`);
  }
  return Number.parseInt(value, 10);
}

function printUsage(print: Print): void {
  print("Usage: plwn <file.xml> [--synset id]... [--lang pl|en] [--relation id] [--format json|text]\n");
  print("Examples:");
  print("  plwn plwordnet.xml");
  print("  plwn plwordnet.xml --synset 100 --synset 101");
  print("  plwn plwordnet.xml --lang en --relation 10 --format json");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  const print: Print = (line) => {
    process.stdout.write(`${line}\n`);
  };
  Promise.resolve()
    .then(() => main(process.argv.slice(2), loadConfig(), print))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}

/**
 * Exposes internal helpers for the test suite so argument parsing and report
 * formatting can be asserted without spawning a process.
 */
export const __testing = {
  buildReport,
  formatTextReport,
  main,
  parseArgs,
};
