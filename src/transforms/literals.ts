/**
 * Marker call discovery
 *
 * Parses a source file with the TypeScript compiler API and collects calls
 * such as `obf("token")` or `shroud.obfw(`token`)` whose only argument is a
 * string literal. Member calls only count when the object is a namespace
 * import (or require) of the runtime module. Calls to a marker with anything
 * else (a variable, a template with substitutions, several arguments), or to
 * a marker name bound by a local declaration, are reported so the caller can
 * warn.
 */

import * as ts from 'typescript';
import type { CharWidth, MarkedLiteral, SkippedCall } from '../types';
import { DEFAULT_CONFIG } from '../config';
import type { ObfuscatorConfig } from '../config';
import { decodeUnits, encodeText } from '../transform';

export interface ScanResult {
  sourceFile: ts.SourceFile;
  literals: MarkedLiteral[];
  skipped: SkippedCall[];
}

export function scriptKindFor(fileName: string): ts.ScriptKind {
  if (fileName.endsWith('.tsx')) return ts.ScriptKind.TSX;
  if (fileName.endsWith('.jsx')) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/.test(fileName)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

// ── Bindings ───────────────────────────────────────────────────────

/** `require("<runtimeModule>")` */
function isRequireOf(expr: ts.Expression, runtimeModule: string): boolean {
  if (!ts.isCallExpression(expr) || !ts.isIdentifier(expr.expression) || expr.expression.text !== 'require') {
    return false;
  }
  const arg = expr.arguments.length === 1 ? expr.arguments[0] : undefined;
  return arg !== undefined && ts.isStringLiteral(arg) && arg.text === runtimeModule;
}

function bindsName(name: ts.BindingName, text: string): boolean {
  if (ts.isIdentifier(name)) return name.text === text;
  for (const element of name.elements) {
    if (!ts.isOmittedExpression(element) && bindsName(element.name, text)) return true;
  }
  return false;
}

function declarationListBinds(list: ts.VariableDeclarationList, text: string, runtimeModule: string): boolean {
  for (const decl of list.declarations) {
    const init = decl.initializer;
    // `const { obf } = require(...)` and `const obf = require(...).obf` bring the marker in
    if (init && (isRequireOf(init, runtimeModule)
      || (ts.isPropertyAccessExpression(init) && isRequireOf(init.expression, runtimeModule)))) {
      continue;
    }
    if (bindsName(decl.name, text)) return true;
  }
  return false;
}

function statementsDeclare(statements: ts.NodeArray<ts.Statement>, text: string, runtimeModule: string): boolean {
  for (const stmt of statements) {
    if ((ts.isFunctionDeclaration(stmt) || ts.isClassDeclaration(stmt) || ts.isEnumDeclaration(stmt))
      && stmt.name?.text === text) {
      return true;
    }
    if (ts.isVariableStatement(stmt) && declarationListBinds(stmt.declarationList, text, runtimeModule)) {
      return true;
    }
  }
  return false;
}

/** Whether `text` resolves to a declaration in a scope enclosing `node`. */
function isDeclaredAround(node: ts.Node, text: string, runtimeModule: string): boolean {
  for (let scope: ts.Node | undefined = node.parent; scope !== undefined; scope = scope.parent) {
    if (ts.isBlock(scope) || ts.isSourceFile(scope) || ts.isModuleBlock(scope)
      || ts.isCaseClause(scope) || ts.isDefaultClause(scope)) {
      if (statementsDeclare(scope.statements, text, runtimeModule)) return true;
    } else if (ts.isFunctionLike(scope)) {
      if (scope.parameters.some(p => bindsName(p.name, text))) return true;
      if (ts.isFunctionExpression(scope) && scope.name?.text === text) return true;
    } else if (ts.isForStatement(scope) || ts.isForInStatement(scope) || ts.isForOfStatement(scope)) {
      const init = scope.initializer;
      if (init && ts.isVariableDeclarationList(init) && declarationListBinds(init, text, runtimeModule)) return true;
    } else if (ts.isCatchClause(scope)) {
      const decl = scope.variableDeclaration;
      if (decl && bindsName(decl.name, text)) return true;
    }
  }
  return false;
}

/** Names the runtime module is bound to at the top level: `import * as x`, `import x = require()`, `const x = require()`. */
function runtimeNamespaces(sourceFile: ts.SourceFile, runtimeModule: string): Set<string> {
  const names = new Set<string>();
  for (const stmt of sourceFile.statements) {
    if (ts.isImportDeclaration(stmt)) {
      const bindings = stmt.importClause?.namedBindings;
      if (ts.isStringLiteral(stmt.moduleSpecifier) && stmt.moduleSpecifier.text === runtimeModule
        && bindings && ts.isNamespaceImport(bindings)) {
        names.add(bindings.name.text);
      }
    } else if (ts.isImportEqualsDeclaration(stmt)) {
      const ref = stmt.moduleReference;
      if (ts.isExternalModuleReference(ref) && ts.isStringLiteral(ref.expression) && ref.expression.text === runtimeModule) {
        names.add(stmt.name.text);
      }
    } else if (ts.isVariableStatement(stmt)) {
      for (const decl of stmt.declarationList.declarations) {
        if (ts.isIdentifier(decl.name) && decl.initializer && isRequireOf(decl.initializer, runtimeModule)) {
          names.add(decl.name.text);
        }
      }
    }
  }
  return names;
}

// ── Scan ───────────────────────────────────────────────────────────

function describeArguments(args: ts.NodeArray<ts.Expression>): string {
  if (args.length !== 1) return `expected one argument, got ${args.length}`;
  const arg = args[0];
  if (ts.isTemplateExpression(arg)) return 'template literal has substitutions';
  return 'argument is not a string literal';
}

export function findMarkedLiterals(
  code: string,
  fileName: string,
  markers: ObfuscatorConfig['markers'],
  runtimeModule: string = DEFAULT_CONFIG.codegen.runtimeModule,
): ScanResult {
  const sourceFile = ts.createSourceFile(fileName, code, ts.ScriptTarget.Latest, true, scriptKindFor(fileName));
  const narrow = new Set(markers.narrow);
  const wide = new Set(markers.wide);
  const namespaces = runtimeNamespaces(sourceFile, runtimeModule);
  const literals: MarkedLiteral[] = [];
  const skipped: SkippedCall[] = [];

  const lineOf = (pos: number): number => sourceFile.getLineAndCharacterOfPosition(pos).line + 1;

  const calleeName = (expr: ts.Expression): string | null => {
    if (ts.isIdentifier(expr)) return expr.text;
    if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.expression) && namespaces.has(expr.expression.text)) {
      return expr.name.text;
    }
    return null;
  };

  const visit = (node: ts.Node): void => {
    if (ts.isCallExpression(node)) {
      const callee = calleeName(node.expression);
      const width: CharWidth | null = callee === null ? null
        : narrow.has(callee) ? 'narrow'
        : wide.has(callee) ? 'wide'
        : null;

      if (callee !== null && width !== null) {
        const start = node.getStart(sourceFile);
        const line = lineOf(start);
        const arg = node.arguments.length === 1 ? node.arguments[0] : undefined;
        if (ts.isIdentifier(node.expression) && isDeclaredAround(node, callee, runtimeModule)) {
          skipped.push({ line, callee, reason: 'name refers to a local declaration' });
        } else if (arg && (ts.isStringLiteral(arg) || ts.isNoSubstitutionTemplateLiteral(arg))) {
          if (width === 'narrow' && decodeUnits(encodeText(arg.text, width), width) !== arg.text) {
            skipped.push({ line, callee, reason: 'narrow text cannot hold a lone surrogate' });
          } else {
            literals.push({ start, end: node.getEnd(), width, text: arg.text, line });
          }
          return;
        } else {
          skipped.push({ line, callee, reason: describeArguments(node.arguments) });
        }
      }
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return { sourceFile, literals, skipped };
}
