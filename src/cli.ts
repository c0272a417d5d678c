/**
 * Command-line interface for the constraint inference.
 *
 * Usage:
 *   metainfer <model-file> [options]
 *   metainfer --help
 *
 * Options:
 *   --merge                Stack the constraints of every class with its ancestors'
 *   -o, --output <file>    Output file path (default: stdout)
 *   -h, --help             Show help
 */

import * as fs from "fs";
import * as path from "path";
import {
  InferenceError,
  dump,
  inferConstraintsByClass,
  inferLenConstraintsByConstrainedPrimitive,
  mergeConstraintsWithAncestors,
} from "./infer";
import { ModelError, loadModel } from "./loader";
import { SymbolTable } from "./model";

interface CliOptions {
  inputFile: string;
  outputFile: string | null;
  merge: boolean;
}

/**
 * Where the CLI reads from and writes to. Replaced in tests.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  writeFile: (filePath: string, text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  writeFile: (filePath, text) => fs.writeFileSync(filePath, text),
};

const HELP = `
metainfer - infer schema constraints from meta-model invariants

Usage:
  metainfer <model-file> [options]

Options:
  --merge                Stack the constraints of every class with its ancestors'
  -o, --output <file>    Output file path (default: stdout)
  -h, --help             Show this help

Examples:
  metainfer model.yaml
  metainfer model.json --merge -o constraints.txt
`;

type ParsedArgs = { kind: "options"; options: CliOptions } | { kind: "help" } | { kind: "invalid" };

function parseArgs(args: readonly string[], io: CliIO): ParsedArgs {
  const options: CliOptions = {
    inputFile: "",
    outputFile: null,
    merge: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg === "-o" || arg === "--output") {
      i++;
      if (i >= args.length) {
        io.stderr("Error: --output requires a file path");
        return { kind: "invalid" };
      }
      options.outputFile = args[i];
    } else if (arg === "--merge") {
      options.merge = true;
    } else if (arg.startsWith("-")) {
      io.stderr(`Error: Unknown option: ${arg}`);
      return { kind: "invalid" };
    } else {
      if (options.inputFile) {
        io.stderr("Error: Multiple model files not supported");
        return { kind: "invalid" };
      }
      options.inputFile = arg;
    }
    i++;
  }

  if (!options.inputFile) {
    io.stderr("Error: No model file specified");
    return { kind: "invalid" };
  }

  return { kind: "options", options };
}

function reportInferenceErrors(errors: readonly InferenceError[], io: CliIO): void {
  for (const error of errors) {
    io.stderr(`${error.symbol}: ${error.message}`);
  }
}

/**
 * Render the inferred constraints of all classes and of the constrained
 * primitives with a length constraint. Null if the inference failed.
 */
function renderConstraints(symbolTable: SymbolTable, merge: boolean, io: CliIO): string | null {
  const lenByPrimitive = inferLenConstraintsByConstrainedPrimitive(symbolTable);
  if (!lenByPrimitive.success) {
    reportInferenceErrors(lenByPrimitive.errors, io);
    return null;
  }

  const inferred = inferConstraintsByClass(symbolTable);
  if (!inferred.success) {
    reportInferenceErrors(inferred.errors, io);
    return null;
  }

  let constraintsByClass = inferred.value;
  if (merge) {
    const merged = mergeConstraintsWithAncestors(symbolTable, constraintsByClass);
    if (!merged.success) {
      reportInferenceErrors(merged.errors, io);
      return null;
    }
    constraintsByClass = merged.value;
  }

  const blocks: string[] = [];

  for (const constrainedPrimitive of symbolTable.constrainedPrimitives) {
    const constraint = lenByPrimitive.value.get(constrainedPrimitive);
    if (constraint !== undefined && (constraint.minValue !== null || constraint.maxValue !== null)) {
      blocks.push(`${constrainedPrimitive.name}: ${constraint.toString()}`);
    }
  }

  for (const cls of symbolTable.classes) {
    const constraints = constraintsByClass.get(cls);
    if (constraints !== undefined) {
      blocks.push(`${cls.name}:\n${dump(constraints)}`);
    }
  }

  return blocks.join("\n\n");
}

/**
 * Run the CLI and return the exit code.
 */
export function runCli(args: readonly string[], io: CliIO = defaultIO): number {
  if (args.length === 0) {
    io.stdout(HELP);
    return 1;
  }

  const parsed = parseArgs(args, io);
  if (parsed.kind === "help") {
    io.stdout(HELP);
    return 0;
  }
  if (parsed.kind === "invalid") {
    return 1;
  }
  const { options } = parsed;

  const inputPath = path.resolve(options.inputFile);

  let symbolTable: SymbolTable;
  try {
    symbolTable = loadModel(inputPath);
  } catch (err) {
    if (err instanceof ModelError) {
      for (const problem of err.problems) {
        io.stderr(`${options.inputFile}: ${problem}`);
      }
      return 1;
    }
    if (err instanceof Error && "code" in err) {
      io.stderr(`Error reading file: ${inputPath}`);
      io.stderr(err.message);
      return 1;
    }
    throw err;
  }

  const output = renderConstraints(symbolTable, options.merge, io);
  if (output === null) {
    return 1;
  }

  if (options.outputFile) {
    const outputPath = path.resolve(options.outputFile);
    try {
      io.writeFile(outputPath, output + "\n");
    } catch (err) {
      io.stderr(`Error writing file: ${outputPath}`);
      if (err instanceof Error) {
        io.stderr(err.message);
      }
      return 1;
    }
    io.stderr(`Inferred ${options.inputFile} -> ${options.outputFile}`);
  } else {
    io.stdout(output);
  }

  return 0;
}
