#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { loadServiceDescription } from "../generator/discovery/service_description.js";
import {
  DEFAULT_NAMESPACE,
  type EmitTarget,
  ServiceGenerator,
} from "../generator/service_generator.js";

interface Options {
  input: string | null;
  output: string | null;
  target: EmitTarget;
  namespace: string;
  modules: Record<string, string>;
  verbose: boolean;
}

function parseTarget(value: string): EmitTarget {
  if (value === "csharp" || value === "typescript") return value;
  throw new Error(`Unknown target: ${value} (expected csharp or typescript)`);
}

/**
 * "Newtonsoft.Json=./json.js" -> ["Newtonsoft.Json", "./json.js"]
 */
function parseModuleMapping(value: string): [string, string] {
  const index = value.indexOf("=");
  if (index <= 0 || index === value.length - 1) {
    throw new Error(`Invalid module mapping: ${value} (expected Namespace=specifier)`);
  }
  return [value.slice(0, index), value.slice(index + 1)];
}

function parseArgs(argv: string[]): Options {
  const opts: Options = {
    input: null,
    output: null,
    target: "csharp",
    namespace: DEFAULT_NAMESPACE,
    modules: {},
    verbose: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-i" || arg === "--input") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -i/--input");
      opts.input = value;
      i += 1;
      continue;
    }
    if (arg === "-o" || arg === "--output") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -o/--output");
      opts.output = value;
      i += 1;
      continue;
    }
    if (arg === "-t" || arg === "--target") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -t/--target");
      opts.target = parseTarget(value);
      i += 1;
      continue;
    }
    if (arg === "-n" || arg === "--namespace") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -n/--namespace");
      opts.namespace = value;
      i += 1;
      continue;
    }
    if (arg === "-m" || arg === "--module") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -m/--module");
      const [namespace, specifier] = parseModuleMapping(value);
      opts.modules[namespace] = specifier;
      i += 1;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    }
    if (arg !== undefined && !arg.startsWith("-") && opts.input === null) {
      opts.input = arg;
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

function printHelp(): void {
  console.log(`Usage: service-codegen -i <discovery.json> [options]

Options:
  -i, --input <file>       Discovery document
  -o, --output <file>      Output file (default: stdout)
  -t, --target <lang>      csharp | typescript (default: csharp)
  -n, --namespace <name>   Namespace of the generated class (default: ${DEFAULT_NAMESPACE})
  -m, --module <ns=mod>    TypeScript module for a CLR namespace (repeatable;
                           default: the namespace in lower case)
  -v, --verbose            Verbose logging
  -h, --help               Show this help

Examples:
  service-codegen -i books.json
  service-codegen -i books.json -t typescript -o BooksService.ts
  service-codegen -i books.json -t typescript -m Newtonsoft.Json=./json.js
`);
}

async function main() {
  const opts = parseArgs(process.argv.slice(2));

  const input = opts.input;
  if (input === null) {
    printHelp();
    process.exit(1);
  }

  const resolvedInput = path.resolve(input);
  if (!fs.existsSync(resolvedInput)) {
    console.error(`Input not found: ${resolvedInput}`);
    process.exitCode = 1;
    return;
  }

  try {
    const service = loadServiceDescription(resolvedInput);
    const generator = new ServiceGenerator({ verbose: opts.verbose });
    const source = generator.generateSource(service, {
      target: opts.target,
      namespace: opts.namespace,
      modules: opts.modules,
    });

    if (opts.output === null) {
      process.stdout.write(source);
      return;
    }
    const outPath = path.resolve(opts.output);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, source, "utf8");
    if (opts.verbose) {
      console.log(`Generated: ${outPath}`);
    }
  } catch (err) {
    console.error(`Error generating ${input}:`);
    if (err instanceof Error) console.error(err.message);
    else console.error(err);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
