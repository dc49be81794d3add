import { expect } from "chai";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

import {
  assertCompilerDiagnosticCode,
  COMPILER_DIAGNOSTIC_CODES,
  compilerDiagnosticDomain,
  isCompilerDiagnosticCode,
} from "./diagnostics.js";

const ERROR_CLASSES: ReadonlySet<string> = new Set([
  "CompileError",
  "DataTypeError",
  "SymbolError",
  "GenerationError",
  "ParseError",
  "TransformationError",
  "TangentLinearError",
  "InternalError",
]);

describe("@gridweave/compiler diagnostics registry", () => {
  function sourceRoot(): string {
    return resolve(dirname(fileURLToPath(import.meta.url)));
  }

  function compilerSourceFiles(): readonly string[] {
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        const abs = join(dir, entry);
        if (statSync(abs).isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts") || abs.endsWith(".test.ts")) continue;
        out.push(abs);
      }
    };
    walk(sourceRoot());
    return out.sort((a, b) => a.localeCompare(b));
  }

  function usedCodes(): readonly string[] {
    const matches = new Set<string>();
    for (const file of compilerSourceFiles()) {
      if (file === join(sourceRoot(), "diagnostics.ts")) continue;
      for (const code of readFileSync(file, "utf-8").match(/\bGW\d{4}\b/g) ?? []) matches.add(code);
    }
    return [...matches].sort((a, b) => a.localeCompare(b));
  }

  it("keeps diagnostic codes normalized and unique", () => {
    const values = [...COMPILER_DIAGNOSTIC_CODES];
    expect(new Set(values).size).to.equal(values.length);
    for (const code of values) expect(code).to.match(/^GW\d{4}$/);
  });

  it("keeps diagnostic usage synchronized with the registry", () => {
    const fromRegistry = [...COMPILER_DIAGNOSTIC_CODES].sort((a, b) => a.localeCompare(b));
    expect(usedCodes()).to.deep.equal(fromRegistry);
  });

  it("rejects unknown diagnostic codes", () => {
    expect(() => assertCompilerDiagnosticCode("GW9999")).to.throw("Unknown compiler diagnostic code 'GW9999'.");
    expect(compilerDiagnosticDomain("GW9999")).to.equal("other");
  });

  it("maps each registered diagnostic code into a known domain", () => {
    for (const code of COMPILER_DIAGNOSTIC_CODES) {
      expect(compilerDiagnosticDomain(code)).to.not.equal("other");
    }
    expect(compilerDiagnosticDomain("GW5101")).to.equal("transform");
    expect(compilerDiagnosticDomain("GW1102")).to.equal("symbols");
  });

  it("keeps compiler sources free of raw Error throws", () => {
    const offenders = compilerSourceFiles().filter(
      (file) => file !== join(sourceRoot(), "diagnostics.ts") && readFileSync(file, "utf-8").includes("throw new Error(")
    );
    expect(offenders).to.deep.equal([]);
  });

  it("constructs compile errors with a registered literal code", () => {
    const offenders: string[] = [];
    for (const file of compilerSourceFiles()) {
      const src = readFileSync(file, "utf-8");
      const sf = ts.createSourceFile(file, src, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
      const walk = (node: ts.Node): void => {
        if (ts.isNewExpression(node) && ts.isIdentifier(node.expression) && ERROR_CLASSES.has(node.expression.text)) {
          const [code] = node.arguments ?? [];
          const literal = code !== undefined && ts.isStringLiteral(code) ? code.text : null;
          if (literal === null || !isCompilerDiagnosticCode(literal)) {
            const { line, character } = sf.getLineAndCharacterOfPosition(node.getStart(sf));
            offenders.push(`${file}:${line + 1}:${character + 1}`);
          }
        }
        ts.forEachChild(node, walk);
      };
      walk(sf);
    }
    expect(offenders).to.deep.equal([]);
  });
});
