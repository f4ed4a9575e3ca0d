#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { compileDrawio } from "./compiler/index.js";
import { DEFAULT_INDENTATION, DEFAULT_LITERAL_STYLE, DEFAULT_MAX_GAP, METACHARACTERS } from "./compiler/defaults.js";
import { parseCapitalisation, parseConfigYaml, parseIndentation, parseMaxGap, resolveConversionOptions } from "./compiler/options.js";
import { ConfigurationError, describeError } from "./errors.js";
import { formatReport } from "./quality/report.js";
import { serialise } from "./render/manchester.js";
import type { ConversionOptions, ConversionOverrides, Vocabulary } from "./types.js";
import { loadVocabulary, propertyKind, ricVocabulary } from "./vocabulary/ric.js";

const program = new Command();

interface BuildCliOptions {
  output?: string;
  preamble?: boolean;
  ontologyIri?: string;
  prefixIri?: string;
  prefix?: string;
  indentation?: string;
  inferTypesDisable?: boolean;
  labelDisable?: boolean;
  maxGap?: string;
  strictMode?: boolean;
  capitalisation?: string;
  metacharacter: string[];
  literalStyle?: string;
  config?: string;
  vocabulary?: string;
  verbose?: boolean;
}

interface VocabularyCliOptions {
  vocabulary?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const DIAGRAM_EXTENSIONS = new Set([".drawio", ".xml"]);

function defaultOutputPath(input: string): string {
  const parsed = path.parse(input);
  const name = parsed.name
    .toLowerCase()
    .replace(/ /gu, "_")
    .replace(/[()[\]/,:."']/gu, "");
  return path.join(parsed.dir, `${name}.owl`);
}

/** Diagram files below a directory, depth first, in name order. */
async function findDiagramFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name, "en"));

  const found = await Promise.all(
    entries.map(async (entry): Promise<string[]> => {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        return findDiagramFiles(fullPath);
      }
      const isDiagram = entry.isFile() && DIAGRAM_EXTENSIONS.has(path.extname(entry.name).toLowerCase());
      return isDiagram ? [fullPath] : [];
    }),
  );
  return found.flat();
}

async function resolveBuildInputs(inputs: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const raw of inputs) {
    const input = path.resolve(raw);
    let stat;
    try {
      stat = await fs.stat(input);
    } catch {
      throw new ConfigurationError(`Input not found: ${raw}`);
    }

    if (stat.isDirectory()) {
      const discovered = await findDiagramFiles(input);
      if (discovered.length === 0) {
        throw new ConfigurationError(`No .drawio files found under directory: ${raw}`);
      }
      files.push(...discovered);
      continue;
    }

    if (!stat.isFile()) {
      throw new ConfigurationError(`Unsupported input type: ${raw}`);
    }
    files.push(input);
  }

  return files;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function cliOverrides(opts: BuildCliOptions): ConversionOverrides {
  return {
    parse: {
      literalStyle: opts.literalStyle,
    },
    resolver: {
      maxGap: opts.maxGap === undefined ? undefined : parseMaxGap(opts.maxGap),
      strict: opts.strictMode ? true : undefined,
    },
    sanitiser: {
      capitalisation: opts.capitalisation === undefined ? undefined : parseCapitalisation(opts.capitalisation),
      rules: opts.metacharacter.length > 0 ? opts.metacharacter : undefined,
    },
    serialisation: {
      includePreamble: opts.preamble ? true : undefined,
      inferLiteralTypes: opts.inferTypesDisable ? false : undefined,
      includeLabel: opts.labelDisable ? false : undefined,
      ontologyIri: opts.ontologyIri,
      prefix: opts.prefix,
      prefixIri: opts.prefixIri,
      indentation: opts.indentation === undefined ? undefined : parseIndentation(opts.indentation),
    },
  };
}

async function resolveOptions(opts: BuildCliOptions): Promise<ConversionOptions> {
  const fileOverrides = opts.config ? parseConfigYaml(await fs.readFile(opts.config, "utf8")) : {};
  return resolveConversionOptions(fileOverrides, cliOverrides(opts));
}

function resolveVocabulary(vocabularyPath: string | undefined): Vocabulary {
  return vocabularyPath ? loadVocabulary(path.resolve(vocabularyPath)) : ricVocabulary;
}

function convert(source: string, options: ConversionOptions, vocabulary: Vocabulary, verbose: boolean): string {
  const { blocks, report } = compileDrawio(source, options, vocabulary);
  const owl = serialise(blocks, vocabulary, options.serialisation);
  if (verbose) {
    process.stderr.write(formatReport(report));
  }
  return `${owl}\n`;
}

async function writeOutput(outputPath: string | undefined, owl: string): Promise<void> {
  if (!outputPath || outputPath === "-") {
    process.stdout.write(owl);
    return;
  }
  await fs.writeFile(outputPath, owl, "utf8");
  process.stderr.write(`Generated: ${outputPath}\n`);
}

async function runBuild(inputs: string[], opts: BuildCliOptions): Promise<void> {
  const options = await resolveOptions(opts);
  const vocabulary = resolveVocabulary(opts.vocabulary);
  const verbose = Boolean(opts.verbose);

  if (inputs.length === 0) {
    await writeOutput(opts.output, convert(await readStdin(), options, vocabulary, verbose));
    return;
  }

  const files = await resolveBuildInputs(inputs);
  if (files.length > 1 && opts.output && opts.output !== "-") {
    throw new ConfigurationError("--output is not supported when several diagrams are converted.");
  }
  if (files.length > 1) {
    process.stderr.write(`Resolved ${files.length} diagram files\n`);
  }

  let failures = 0;
  for (const file of files) {
    const outputPath = opts.output ?? defaultOutputPath(file);
    try {
      const source = await fs.readFile(file, "utf8");
      await writeOutput(outputPath, convert(source, options, vocabulary, verbose));
    } catch (error) {
      failures += 1;
      process.stderr.write(`${file}: ${describeError(error)}\n`);
    }
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
}

function runVocabulary(names: string[], opts: VocabularyCliOptions): void {
  const vocabulary = resolveVocabulary(opts.vocabulary);
  if (names.length === 0) {
    process.stdout.write(`prefix: ${vocabulary.prefix}: <${vocabulary.iri}>\n`);
    process.stdout.write(`import: <${vocabulary.importIri}>\n`);
    process.stdout.write(`classes: ${vocabulary.classes.size}\n`);
    process.stdout.write(`object properties: ${vocabulary.objectProperties.size}\n`);
    process.stdout.write(`datatype properties: ${vocabulary.datatypeProperties.size}\n`);
    return;
  }

  for (const raw of names) {
    const name = raw.startsWith(`${vocabulary.prefix}:`) ? raw.slice(vocabulary.prefix.length + 1) : raw;
    const kind = vocabulary.classes.has(name) ? "class" : propertyKind(vocabulary, name);
    if (!kind) {
      process.exitCode = 1;
    }
    const label = kind === "object" || kind === "datatype" ? `${kind} property` : kind ?? "unknown";
    process.stdout.write(`${raw}: ${label}\n`);
  }
}

function normalizeArgvForDefaultBuild(argv: string[]): string[] {
  const first = argv[2];
  if (first === undefined) {
    return [...argv, "build"];
  }

  const passThrough = new Set(["build", "vocabulary", "help", "-h", "--help", "-V", "--version"]);
  if (passThrough.has(first)) {
    return argv;
  }

  return [argv[0], argv[1], "build", ...argv.slice(2)];
}

program
  .name("drawio2owl")
  .description("Construct RiC-O individuals in OWL Manchester syntax from a draw.io diagram")
  .version("0.1.0");

program
  .command("build")
  .description("Convert diagrams; reads stdin and writes stdout when no input is given")
  .argument("[inputs...]", "input .drawio file(s) or directories")
  .option("-o, --output <path>", "output .owl path for a single diagram ('-' for stdout)")
  .option("-P, --preamble", "include a preamble defining prefix and ontology IRIs and imports")
  .option("--ontology-iri <iri>", "IRI of the ontology (default: generated, including a timestamp)")
  .option("-p, --prefix-iri <iri>", "IRI for the individuals' prefix (default: ontology IRI followed by '#')")
  .option("-x, --prefix <prefix>", "prefix used with all generated individuals (default: none)")
  .option("-n, --indentation <spaces>", `number of spaces to indent by (default: ${DEFAULT_INDENTATION})`)
  .option("-i, --infer-types-disable", "disable inference of the type of literals")
  .option("-l, --label-disable", "do not annotate individuals with their original label")
  .option("-g, --max-gap <pixels>", `largest gap between an unlocked arrow end and a node (default: ${DEFAULT_MAX_GAP})`)
  .option("-s, --strict-mode", "require every arrow to be locked to its source and target")
  .option("-c, --capitalisation <scheme>", "identifier capitalisation: upper-camel | lower-camel | flat | none (default: upper-camel)")
  .option(
    "-m, --metacharacter <rule>",
    `substitution for a space or one of ${METACHARACTERS.join(" ")}: '<character>=<replacement>', 'remove' or 'url' (repeatable)`,
    collect,
    [],
  )
  .option("--literal-style <marker>", `style marker of literal shapes (default: ${DEFAULT_LITERAL_STYLE})`)
  .option("--config <path>", "YAML configuration file")
  .option("--vocabulary <path>", "alternative vocabulary JSON")
  .option("--verbose", "print a conversion report to stderr")
  .action(async (inputs: string[], opts: BuildCliOptions) => runBuild(inputs, opts));

program
  .command("vocabulary")
  .description("Report whether names are classes, object properties or datatype properties")
  .argument("[names...]", "names to look up, with or without the prefix")
  .option("--vocabulary <path>", "alternative vocabulary JSON")
  .action((names: string[], opts: VocabularyCliOptions) => runVocabulary(names, opts));

const argv = normalizeArgvForDefaultBuild([...process.argv]);
program.parseAsync(argv).catch((error: unknown) => {
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(1);
});
