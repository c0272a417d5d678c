/**
 * Meta-model loader - Reads a meta-model document (YAML or JSON) and resolves
 * it into a symbol table.
 *
 * Resolution collects every problem it finds and reports them together in a
 * single ModelError.
 */

import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { Expr } from "./expr";
import { sortTopologically } from "./hierarchy";
import { LexerError, Token, tokenize } from "./lexer";
import {
  Class,
  Constant,
  ConstrainedPrimitive,
  Enumeration,
  EnumerationLiteral,
  Invariant,
  OurType,
  PrimitiveType,
  PrimitiveValue,
  Property,
  SymbolTable,
  TypeAnnotation,
  Verification,
  isPrimitiveType,
} from "./model";
import { ParseError, parse } from "./parser";

// ============================================================================
// Document Schema
// ============================================================================

const PrimitiveTypeSchema = z.enum(["bool", "int", "float", "str", "bytearray"]);

const PrimitiveValueSchema = z.union([z.boolean(), z.number(), z.string()]);

const EnumerationSchema = z.object({
  name: z.string(),
  literals: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
});

const ConstrainedPrimitiveSchema = z.object({
  name: z.string(),
  constrainee: PrimitiveTypeSchema,
  inheritances: z.array(z.string()).default([]),
  invariants: z.array(z.string()).default([]),
});

const ClassSchema = z.object({
  name: z.string(),
  abstract: z.boolean().default(false),
  inheritances: z.array(z.string()).default([]),
  properties: z.array(z.object({ name: z.string(), type: z.string() })).default([]),
  invariants: z.array(z.string()).default([]),
});

const ConstantSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("primitive"),
    name: z.string(),
    type: PrimitiveTypeSchema,
    value: PrimitiveValueSchema,
  }),
  z.object({
    kind: z.literal("set_of_primitives"),
    name: z.string(),
    type: PrimitiveTypeSchema,
    literals: z.array(PrimitiveValueSchema),
  }),
  z.object({
    kind: z.literal("set_of_enumeration_literals"),
    name: z.string(),
    enumeration: z.string(),
    literals: z.array(z.string()),
  }),
]);

const VerificationSchema = z.object({
  name: z.string(),
  arguments: z.array(z.string()).default([]),
  pattern: z.string().optional(),
  body: z.string().optional(),
});

export const ModelDocumentSchema = z.object({
  enumerations: z.array(EnumerationSchema).default([]),
  constrained_primitives: z.array(ConstrainedPrimitiveSchema).default([]),
  classes: z.array(ClassSchema).default([]),
  constants: z.array(ConstantSchema).default([]),
  verifications: z.array(VerificationSchema).default([]),
});

export type ModelDocument = z.infer<typeof ModelDocumentSchema>;

type ClassDecl = ModelDocument["classes"][number];
type ConstrainedPrimitiveDecl = ModelDocument["constrained_primitives"][number];
type ConstantDecl = ModelDocument["constants"][number];
type VerificationDecl = ModelDocument["verifications"][number];

// ============================================================================
// Errors
// ============================================================================

export class ModelError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid meta-model:\n${problems.map((problem) => `  ${problem}`).join("\n")}`);
    this.name = "ModelError";
  }
}

function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

type Unresolved = { success: false; error: string };
type Resolved<T> = { success: true; value: T } | Unresolved;

const ok = <T>(value: T): Resolved<T> => ({ success: true, value });
const problem = (error: string): Unresolved => ({ success: false, error });

// ============================================================================
// Type Annotations
// ============================================================================

function describeToken(tok: Token): string {
  return tok.type === "EOF" ? "end of input" : `'${tok.value}'`;
}

/**
 * Parse an annotation such as `Optional[List[Something]]`.
 */
export function parseTypeAnnotation(
  text: string,
  ourTypesByName: ReadonlyMap<string, OurType>
): Resolved<TypeAnnotation> {
  let tokens: Token[];
  try {
    tokens = tokenize(text);
  } catch (err) {
    if (err instanceof LexerError) {
      return problem(err.message);
    }
    throw err;
  }

  let pos = 0;

  const parseOne = (): Resolved<TypeAnnotation> => {
    const tok = tokens[pos];
    if (tok.type !== "IDENT") {
      return problem(`expected a type name, got ${describeToken(tok)}`);
    }
    pos++;

    const typeName = tok.value;

    if (typeName === "Optional" || typeName === "List") {
      if (tokens[pos].type !== "LBRACKET") {
        return problem(`expected '[' after ${typeName}, got ${describeToken(tokens[pos])}`);
      }
      pos++;

      const inner = parseOne();
      if (!inner.success) return inner;

      if (tokens[pos].type !== "RBRACKET") {
        return problem(`expected ']', got ${describeToken(tokens[pos])}`);
      }
      pos++;

      return ok<TypeAnnotation>(
        typeName === "Optional"
          ? { tag: "optional", value: inner.value }
          : { tag: "list", items: inner.value }
      );
    }

    if (isPrimitiveType(typeName)) {
      return ok<TypeAnnotation>({ tag: "primitive", aType: typeName });
    }

    const ourType = ourTypesByName.get(typeName);
    if (ourType === undefined) {
      return problem(`the type ${typeName} is not defined`);
    }
    return ok<TypeAnnotation>({ tag: "ourType", ourType });
  };

  const result = parseOne();
  if (result.success && tokens[pos].type !== "EOF") {
    return problem(`unexpected ${describeToken(tokens[pos])} after the type`);
  }
  return result;
}

// ============================================================================
// Values and Verifications
// ============================================================================

function valueFitsType(value: PrimitiveValue, aType: PrimitiveType): boolean {
  switch (aType) {
    case "bool":
      return typeof value === "boolean";
    case "int":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number";
    case "str":
    case "bytearray":
      return typeof value === "string";
  }
}

/**
 * The pattern of a body `match(PATTERN, ARG) is not None` where ARG is the sole
 * argument of the verification. Null for any other body.
 */
export function matchPatternVerificationBody(body: Expr, args: readonly string[]): string | null {
  if (body.tag !== "isNotNone" || args.length !== 1) return null;

  const call = body.value;
  if (call.tag !== "functionCall" || call.name.identifier !== "match" || call.args.length !== 2) {
    return null;
  }

  const [pattern, arg] = call.args;
  if (pattern.tag !== "constant" || pattern.kind !== "str") return null;
  if (arg.tag !== "name" || arg.identifier !== args[0]) return null;

  return pattern.value;
}

// ============================================================================
// Resolution
// ============================================================================

class Resolver {
  private problems: string[] = [];
  private ourTypesByName = new Map<string, OurType>();

  constructor(private doc: ModelDocument) {}

  resolve(): SymbolTable {
    this.checkUniqueNames();

    let literalId = 0;
    const enumerations = this.doc.enumerations.map((decl) => {
      const enumeration: Enumeration = { tag: "enumeration", name: decl.name, literals: [], literalsByName: new Map() };
      const literalsByName = new Map<string, EnumerationLiteral>();
      for (const literalDecl of decl.literals) {
        const literal: EnumerationLiteral = {
          name: literalDecl.name,
          value: literalDecl.value,
          id: literalId++,
          enumeration,
        };
        if (literalsByName.has(literal.name)) {
          this.problems.push(`The literal ${literal.name} is defined more than once in the enumeration ${decl.name}`);
        }
        enumeration.literals.push(literal);
        literalsByName.set(literal.name, literal);
      }
      enumeration.literalsByName = literalsByName;
      return enumeration;
    });

    const constrainedPrimitives = this.doc.constrained_primitives.map(
      (decl): ConstrainedPrimitive => ({
        tag: "constrainedPrimitive",
        name: decl.name,
        constrainee: decl.constrainee,
        inheritances: [],
        invariants: [],
      })
    );

    const classes = this.doc.classes.map(
      (decl): Class => ({
        tag: "class",
        name: decl.name,
        isAbstract: decl.abstract,
        inheritances: [],
        properties: [],
        propertiesByName: new Map(),
        invariants: [],
      })
    );

    const ourTypes: OurType[] = [...enumerations, ...constrainedPrimitives, ...classes];
    for (const ourType of ourTypes) {
      if (!this.ourTypesByName.has(ourType.name)) {
        this.ourTypesByName.set(ourType.name, ourType);
      }
    }

    this.doc.constrained_primitives.forEach((decl, i) =>
      this.resolveConstrainedPrimitiveAncestors(constrainedPrimitives[i], decl.inheritances)
    );
    this.doc.classes.forEach((decl, i) => this.resolveClassAncestors(classes[i], decl.inheritances));

    const inheritancesByName = new Map<string, readonly string[]>();
    for (const decl of [...this.doc.constrained_primitives, ...this.doc.classes]) {
      inheritancesByName.set(decl.name, decl.inheritances);
    }

    const order = sortTopologically(
      ourTypes.map((ourType) => ourType.name),
      (typeName) => inheritancesByName.get(typeName) ?? []
    );
    for (const cycle of order.cycles) {
      this.problems.push(`There is an inheritance cycle: ${cycle.join(" -> ")}`);
    }

    // Members can only be inherited once the hierarchy is sound.
    this.throwIfProblems();

    const classDeclsByName = new Map(this.doc.classes.map((decl): [string, ClassDecl] => [decl.name, decl]));
    const primitiveDeclsByName = new Map(
      this.doc.constrained_primitives.map((decl): [string, ConstrainedPrimitiveDecl] => [decl.name, decl])
    );

    const ourTypesTopologicallySorted: OurType[] = [];
    for (const typeName of order.sorted) {
      const ourType = this.ourTypesByName.get(typeName);
      if (ourType === undefined) {
        throw new Error(`Expected the type ${typeName} to be registered`);
      }
      ourTypesTopologicallySorted.push(ourType);

      if (ourType.tag === "class") {
        const decl = classDeclsByName.get(typeName);
        if (decl !== undefined) this.resolveClassMembers(ourType, decl);
      } else if (ourType.tag === "constrainedPrimitive") {
        const decl = primitiveDeclsByName.get(typeName);
        if (decl !== undefined) {
          ourType.invariants = [
            ...inheritedInvariants(ourType.inheritances),
            ...this.parseInvariants(ourType, decl.invariants),
          ];
        }
      }
    }

    const constants = this.doc.constants.flatMap((decl) => this.resolveConstant(decl));
    const verificationFunctions = this.doc.verifications.flatMap((decl) => this.resolveVerification(decl));

    this.throwIfProblems();

    return {
      ourTypes,
      ourTypesTopologicallySorted,
      classes,
      constrainedPrimitives,
      enumerations,
      constants,
      constantsByName: new Map(constants.map((constant): [string, Constant] => [constant.name, constant])),
      verificationFunctions,
    };
  }

  private throwIfProblems(): void {
    if (this.problems.length > 0) {
      throw new ModelError(this.problems);
    }
  }

  private checkUniqueNames(): void {
    const seen = new Set<string>();
    const reported = new Set<string>();

    const names = [
      ...this.doc.enumerations,
      ...this.doc.constrained_primitives,
      ...this.doc.classes,
      ...this.doc.constants,
      ...this.doc.verifications,
    ].map((decl) => decl.name);

    for (const symbolName of names) {
      if (seen.has(symbolName) && !reported.has(symbolName)) {
        this.problems.push(`The name ${symbolName} is defined more than once`);
        reported.add(symbolName);
      }
      seen.add(symbolName);
    }
  }

  private resolveConstrainedPrimitiveAncestors(
    constrainedPrimitive: ConstrainedPrimitive,
    ancestorNames: readonly string[]
  ): void {
    for (const ancestorName of ancestorNames) {
      const ancestor = this.ourTypesByName.get(ancestorName);
      if (ancestor === undefined) {
        this.problems.push(`The ancestor ${ancestorName} of ${constrainedPrimitive.name} is not defined`);
      } else if (ancestor.tag !== "constrainedPrimitive") {
        this.problems.push(
          `The constrained primitive ${constrainedPrimitive.name} inherits from ${ancestorName} ` +
            `which is not a constrained primitive`
        );
      } else if (ancestor.constrainee !== constrainedPrimitive.constrainee) {
        this.problems.push(
          `The constrained primitive ${constrainedPrimitive.name} constrains ${constrainedPrimitive.constrainee}, ` +
            `but its ancestor ${ancestorName} constrains ${ancestor.constrainee}`
        );
      } else {
        constrainedPrimitive.inheritances.push(ancestor);
      }
    }
  }

  private resolveClassAncestors(cls: Class, ancestorNames: readonly string[]): void {
    for (const ancestorName of ancestorNames) {
      const ancestor = this.ourTypesByName.get(ancestorName);
      if (ancestor === undefined) {
        this.problems.push(`The ancestor ${ancestorName} of ${cls.name} is not defined`);
      } else if (ancestor.tag !== "class") {
        this.problems.push(`The class ${cls.name} inherits from ${ancestorName} which is not a class`);
      } else {
        cls.inheritances.push(ancestor);
      }
    }
  }

  private resolveClassMembers(cls: Class, decl: ClassDecl): void {
    const properties: Property[] = [];
    const propertiesByName = new Map<string, Property>();

    for (const ancestor of cls.inheritances) {
      for (const prop of ancestor.properties) {
        const existing = propertiesByName.get(prop.name);
        if (existing === prop) continue;
        if (existing !== undefined) {
          this.problems.push(
            `The property ${prop.name} of the class ${cls.name} is inherited from both ` +
              `${existing.specifiedFor.name} and ${prop.specifiedFor.name}`
          );
          continue;
        }
        properties.push(prop);
        propertiesByName.set(prop.name, prop);
      }
    }

    for (const propDecl of decl.properties) {
      const existing = propertiesByName.get(propDecl.name);
      if (existing !== undefined) {
        this.problems.push(
          existing.specifiedFor === cls
            ? `The property ${propDecl.name} is defined more than once in the class ${cls.name}`
            : `The property ${propDecl.name} of the class ${cls.name} is already inherited ` +
                `from ${existing.specifiedFor.name}`
        );
        continue;
      }

      const typeAnnotation = parseTypeAnnotation(propDecl.type, this.ourTypesByName);
      if (!typeAnnotation.success) {
        this.problems.push(
          `The type ${propDecl.type} of the property ${propDecl.name} of the class ${cls.name} ` +
            `is invalid: ${typeAnnotation.error}`
        );
        continue;
      }

      const prop: Property = { name: propDecl.name, typeAnnotation: typeAnnotation.value, specifiedFor: cls };
      properties.push(prop);
      propertiesByName.set(prop.name, prop);
    }

    cls.properties = properties;
    cls.propertiesByName = propertiesByName;
    cls.invariants = [...inheritedInvariants(cls.inheritances), ...this.parseInvariants(cls, decl.invariants)];
  }

  private parseInvariants(owner: Class | ConstrainedPrimitive, texts: readonly string[]): Invariant[] {
    const invariants: Invariant[] = [];
    for (const text of texts) {
      try {
        invariants.push({ text, body: parse(text), specifiedFor: owner });
      } catch (err) {
        if (err instanceof LexerError || err instanceof ParseError) {
          this.problems.push(
            `The invariant ${JSON.stringify(text)} of ${owner.name} could not be parsed: ${err.message}`
          );
        } else {
          throw err;
        }
      }
    }
    return invariants;
  }

  private resolveConstant(decl: ConstantDecl): Constant[] {
    switch (decl.kind) {
      case "primitive":
        if (!valueFitsType(decl.value, decl.type)) {
          this.problems.push(
            `The value ${JSON.stringify(decl.value)} of the constant ${decl.name} does not match the type ${decl.type}`
          );
          return [];
        }
        return [{ tag: "constantPrimitive", name: decl.name, aType: decl.type, value: decl.value }];

      case "set_of_primitives": {
        const misfits = decl.literals.filter((value) => !valueFitsType(value, decl.type));
        for (const value of misfits) {
          this.problems.push(
            `The literal ${JSON.stringify(value)} of the constant ${decl.name} does not match the type ${decl.type}`
          );
        }
        if (misfits.length > 0) return [];

        const aType = decl.type;
        return [
          {
            tag: "constantSetOfPrimitives",
            name: decl.name,
            aType,
            literals: decl.literals.map((value) => ({ value, aType })),
          },
        ];
      }

      case "set_of_enumeration_literals": {
        const enumeration = this.ourTypesByName.get(decl.enumeration);
        if (enumeration === undefined || enumeration.tag !== "enumeration") {
          this.problems.push(`The enumeration ${decl.enumeration} of the constant ${decl.name} is not defined`);
          return [];
        }

        const literals: EnumerationLiteral[] = [];
        for (const literalName of decl.literals) {
          const literal = enumeration.literalsByName.get(literalName);
          if (literal === undefined) {
            this.problems.push(
              `The literal ${literalName} of the constant ${decl.name} ` +
                `is not a literal of the enumeration ${enumeration.name}`
            );
          } else {
            literals.push(literal);
          }
        }
        if (literals.length !== decl.literals.length) return [];

        return [{ tag: "constantSetOfEnumerationLiterals", name: decl.name, enumeration, literals }];
      }
    }
  }

  private resolveVerification(decl: VerificationDecl): Verification[] {
    if (decl.pattern !== undefined) {
      return [{ tag: "patternVerification", name: decl.name, pattern: decl.pattern }];
    }

    if (decl.body !== undefined) {
      let body: Expr;
      try {
        body = parse(decl.body);
      } catch (err) {
        if (err instanceof LexerError || err instanceof ParseError) {
          this.problems.push(`The body of the verification ${decl.name} could not be parsed: ${err.message}`);
          return [];
        }
        throw err;
      }

      const pattern = matchPatternVerificationBody(body, decl.arguments);
      if (pattern !== null) {
        return [{ tag: "patternVerification", name: decl.name, pattern }];
      }
    }

    return [{ tag: "implementationSpecificVerification", name: decl.name }];
  }
}

/**
 * The invariants of all the ancestors, each once, in inheritance order.
 */
function inheritedInvariants(ancestors: readonly (Class | ConstrainedPrimitive)[]): Invariant[] {
  const seen = new Set<Invariant>();
  const result: Invariant[] = [];
  for (const ancestor of ancestors) {
    for (const invariant of ancestor.invariants) {
      if (!seen.has(invariant)) {
        seen.add(invariant);
        result.push(invariant);
      }
    }
  }
  return result;
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Resolve an already decoded document into a symbol table.
 */
export function resolveModel(decoded: unknown): SymbolTable {
  const result = ModelDocumentSchema.safeParse(decoded ?? {});
  if (!result.success) {
    throw new ModelError(formatZodError(result.error));
  }
  return new Resolver(result.data).resolve();
}

/**
 * Parse a meta-model from YAML (or JSON, which is a subset of YAML) text.
 */
export function parseModel(text: string): SymbolTable {
  let decoded: unknown;
  try {
    decoded = parseYaml(text);
  } catch (error) {
    throw new ModelError([`Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return resolveModel(decoded);
}

export function loadModel(filePath: string): SymbolTable {
  return parseModel(fs.readFileSync(filePath, "utf-8"));
}
