/**
 * TypeScript source emitter for the code AST, printed with the compiler API
 */

import * as ts from "typescript";
import {
  type AccessModifier,
  BinaryOperatorType,
  type CodeExpression,
  type CodeMember,
  type CodeNode,
  CodeNodeKind,
  type CodeStatement,
  type MemberFieldNode,
  type MemberMethodNode,
  type MemberPropertyNode,
  type NamespaceNode,
  type PrimitiveValue,
  type TypeDeclarationNode,
  type TypeReferenceNode,
} from "../ast/types.js";
import { CodegenError } from "../errors/codegen_errors.js";
import { ErrorCollector } from "../errors/error_collector.js";
import {
  isReservedWord,
  isValidIdentifier,
  namespaceOf,
  simpleTypeName,
  toTypeScriptTypeName,
} from "./type_names.js";

const f = ts.factory;

const TS_OPERATORS: Record<BinaryOperatorType, ts.BinaryOperator> = {
  [BinaryOperatorType.IdentityEquality]: ts.SyntaxKind.EqualsEqualsEqualsToken,
  [BinaryOperatorType.IdentityInequality]:
    ts.SyntaxKind.ExclamationEqualsEqualsToken,
  [BinaryOperatorType.ValueEquality]: ts.SyntaxKind.EqualsEqualsEqualsToken,
  [BinaryOperatorType.BooleanAnd]: ts.SyntaxKind.AmpersandAmpersandToken,
  [BinaryOperatorType.BooleanOr]: ts.SyntaxKind.BarBarToken,
};

const KEYWORD_TYPES = new Map<string, ts.KeywordTypeSyntaxKind>([
  ["object", ts.SyntaxKind.ObjectKeyword],
  ["string", ts.SyntaxKind.StringKeyword],
  ["boolean", ts.SyntaxKind.BooleanKeyword],
  ["number", ts.SyntaxKind.NumberKeyword],
  ["void", ts.SyntaxKind.VoidKeyword],
]);

const CLR_METHOD_TO_TYPESCRIPT = new Map<string, string>([
  ["ToString", "toString"],
]);

export interface TypeScriptEmitterOptions {
  /** Module specifier per CLR namespace, e.g. { "Newtonsoft.Json": "./json" } */
  modules?: Readonly<Record<string, string>>;
}

/**
 * Module a CLR namespace is imported from: the configured specifier, or
 * the namespace in lower case ("System.IO" -> "system.io").
 */
export function moduleSpecifierFor(
  namespace: string,
  modules: Readonly<Record<string, string>> = {},
): string {
  return Object.hasOwn(modules, namespace)
    ? modules[namespace]
    : namespace.toLowerCase();
}

/**
 * Renders classes as TypeScript. Referenced CLR types print by their simple
 * name and are imported from the module of their namespace; a CLR
 * namespace becomes nested `export namespace` blocks. The namespace's
 * `using` list is not needed since imports follow the referenced types.
 */
export class TypeScriptEmitter {
  private errors = new ErrorCollector();
  private referenced = new Map<string, string>();
  private localNamespace = "";
  private readonly modules: Readonly<Record<string, string>>;
  private readonly printer = ts.createPrinter({
    newLine: ts.NewLineKind.LineFeed,
  });
  private readonly sourceFile = ts.createSourceFile(
    "generated.ts",
    "",
    ts.ScriptTarget.ES2022,
    false,
    ts.ScriptKind.TS,
  );

  constructor(options: TypeScriptEmitterOptions = {}) {
    this.modules = options.modules ?? {};
  }

  emitNamespace(ns: NamespaceNode): string {
    this.reset(ns.name);
    const classes = ns.types.map((type) => this.classDeclaration(type));
    if (ns.name === "") return this.finish(classes);
    for (const part of ns.name.split(".")) {
      this.checkBinding(part, ns.name);
    }
    return this.finish(this.namespaceDeclaration(ns.name, classes));
  }

  emitType(type: TypeDeclarationNode): string {
    this.reset("");
    return this.finish([this.classDeclaration(type)]);
  }

  private reset(localNamespace: string): void {
    this.errors = new ErrorCollector();
    this.referenced = new Map();
    this.localNamespace = localNamespace;
  }

  private finish(statements: ts.Statement[]): string {
    this.errors.throwIfErrors();
    const imports = this.importDeclarations()
      .map((node) => this.printNode(node))
      .join("\n");
    const body = statements.map((node) => this.printNode(node)).join("\n\n");
    return `${[imports, body].filter((text) => text !== "").join("\n\n")}\n`;
  }

  private printNode(node: ts.Node): string {
    return this.printer.printNode(ts.EmitHint.Unspecified, node, this.sourceFile);
  }

  /**
   * One named import per module, modules and names in sorted order
   */
  private importDeclarations(): ts.ImportDeclaration[] {
    const byModule = new Map<string, string[]>();
    for (const [name, fullName] of this.referenced) {
      const specifier = moduleSpecifierFor(namespaceOf(fullName), this.modules);
      const names = byModule.get(specifier) ?? [];
      names.push(name);
      byModule.set(specifier, names);
    }
    return [...byModule.keys()].sort().map((specifier) => {
      const names = [...(byModule.get(specifier) ?? [])].sort();
      return f.createImportDeclaration(
        undefined,
        f.createImportClause(
          false,
          undefined,
          f.createNamedImports(
            names.map((name) =>
              f.createImportSpecifier(false, undefined, f.createIdentifier(name)),
            ),
          ),
        ),
        f.createStringLiteral(specifier),
      );
    });
  }

  /**
   * "Generated.Apis" -> export namespace Generated { export namespace Apis { ... } }
   */
  private namespaceDeclaration(
    name: string,
    statements: ts.Statement[],
  ): ts.Statement[] {
    return name.split(".").reduceRight<ts.Statement[]>(
      (body, part) => [
        f.createModuleDeclaration(
          [f.createModifier(ts.SyntaxKind.ExportKeyword)],
          f.createIdentifier(part),
          f.createModuleBlock(body),
          ts.NodeFlags.Namespace,
        ),
      ],
      statements,
    );
  }

  private classDeclaration(type: TypeDeclarationNode): ts.ClassDeclaration {
    this.checkBinding(type.name, type.name);
    const modifiers =
      type.access === "public"
        ? [f.createModifier(ts.SyntaxKind.ExportKeyword)]
        : undefined;
    const members = type.members.flatMap((member) =>
      this.member(member, type.name),
    );
    return f.createClassDeclaration(
      modifiers,
      type.name,
      undefined,
      undefined,
      members,
    );
  }

  private member(member: CodeMember, owner: string): ts.ClassElement[] {
    switch (member.kind) {
      case CodeNodeKind.MemberField:
        return [this.field(member, owner)];
      case CodeNodeKind.MemberProperty:
        return this.property(member, owner);
      case CodeNodeKind.MemberMethod:
        return [this.method(member, owner)];
      default:
        this.reportUnsupported(member, owner);
        return [];
    }
  }

  private modifiers(access: AccessModifier, isStatic = false): ts.Modifier[] {
    const modifiers: ts.Modifier[] = [];
    if (access === "public") {
      modifiers.push(f.createModifier(ts.SyntaxKind.PublicKeyword));
    } else if (access === "private") {
      modifiers.push(f.createModifier(ts.SyntaxKind.PrivateKeyword));
    } else if (access === "protected") {
      modifiers.push(f.createModifier(ts.SyntaxKind.ProtectedKeyword));
    }
    if (isStatic) {
      modifiers.push(f.createModifier(ts.SyntaxKind.StaticKeyword));
    }
    return modifiers;
  }

  private field(field: MemberFieldNode, owner: string): ts.PropertyDeclaration {
    const subject = `${owner}.${field.name}`;
    this.checkIdentifier(field.name, subject);
    const declaredType = this.typeNode(field.type, subject);
    const initializer = field.initializer;
    // A field that starts out null must admit null under strictNullChecks.
    const startsNull =
      initializer?.kind === CodeNodeKind.PrimitiveExpression &&
      initializer.value === null;
    const type = startsNull
      ? f.createUnionTypeNode([
          declaredType,
          f.createLiteralTypeNode(f.createNull()),
        ])
      : declaredType;
    return f.createPropertyDeclaration(
      this.modifiers(field.access, field.isStatic),
      field.name,
      undefined,
      type,
      initializer ? this.expression(initializer, subject) : undefined,
    );
  }

  private property(
    property: MemberPropertyNode,
    owner: string,
  ): ts.ClassElement[] {
    const subject = `${owner}.${property.name}`;
    this.checkIdentifier(property.name, subject);
    const elements: ts.ClassElement[] = [];
    if (property.hasGet) {
      elements.push(
        f.createGetAccessorDeclaration(
          this.modifiers(property.access),
          property.name,
          [],
          this.typeNode(property.type, subject),
          this.block(property.getStatements, subject),
        ),
      );
    }
    if (property.hasSet) {
      elements.push(
        f.createSetAccessorDeclaration(
          this.modifiers(property.access),
          property.name,
          [
            f.createParameterDeclaration(
              undefined,
              undefined,
              "value",
              undefined,
              this.typeNode(property.type, subject),
            ),
          ],
          this.block(property.setStatements, subject),
        ),
      );
    }
    return elements;
  }

  private method(method: MemberMethodNode, owner: string): ts.MethodDeclaration {
    const subject = `${owner}.${method.name}`;
    this.checkIdentifier(method.name, subject);
    const parameters = method.parameters.map((param) => {
      this.checkBinding(param.name, subject);
      return f.createParameterDeclaration(
        undefined,
        undefined,
        param.name,
        undefined,
        this.typeNode(param.type, subject),
      );
    });
    return f.createMethodDeclaration(
      this.modifiers(method.access, method.isStatic),
      undefined,
      method.name,
      undefined,
      undefined,
      parameters,
      this.typeNode(method.returnType, subject),
      this.block(method.statements, subject),
    );
  }

  private block(statements: CodeStatement[], subject: string): ts.Block {
    return f.createBlock(
      statements.flatMap((statement) => this.statement(statement, subject)),
      true,
    );
  }

  private statement(statement: CodeStatement, subject: string): ts.Statement[] {
    switch (statement.kind) {
      case CodeNodeKind.VariableDeclaration: {
        this.checkBinding(statement.name, subject);
        const declaration = f.createVariableDeclaration(
          statement.name,
          undefined,
          this.typeNode(statement.type, subject),
          statement.initializer
            ? this.expression(statement.initializer, subject)
            : undefined,
        );
        return [
          f.createVariableStatement(
            undefined,
            f.createVariableDeclarationList([declaration], ts.NodeFlags.Let),
          ),
        ];
      }
      case CodeNodeKind.Assign:
        return [
          f.createExpressionStatement(
            f.createAssignment(
              this.expression(statement.left, subject),
              this.expression(statement.right, subject),
            ),
          ),
        ];
      case CodeNodeKind.Condition:
        return [
          f.createIfStatement(
            this.expression(statement.condition, subject),
            this.block(statement.trueStatements, subject),
            statement.falseStatements.length > 0
              ? this.block(statement.falseStatements, subject)
              : undefined,
          ),
        ];
      case CodeNodeKind.Return:
        return [
          f.createReturnStatement(
            statement.expression
              ? this.expression(statement.expression, subject)
              : undefined,
          ),
        ];
      case CodeNodeKind.ExpressionStatement:
        return [
          f.createExpressionStatement(
            this.expression(statement.expression, subject),
          ),
        ];
      default:
        this.reportUnsupported(statement, subject);
        return [];
    }
  }

  private expression(expr: CodeExpression, subject: string): ts.Expression {
    switch (expr.kind) {
      case CodeNodeKind.PrimitiveExpression:
        return this.primitive(expr.value, subject);
      case CodeNodeKind.ThisReference:
        return f.createThis();
      case CodeNodeKind.FieldReference:
        this.checkIdentifier(expr.fieldName, subject);
        return f.createPropertyAccessExpression(
          this.expression(expr.target, subject),
          expr.fieldName,
        );
      case CodeNodeKind.PropertyReference:
        this.checkIdentifier(expr.propertyName, subject);
        return f.createPropertyAccessExpression(
          this.expression(expr.target, subject),
          expr.propertyName,
        );
      case CodeNodeKind.VariableReference:
      case CodeNodeKind.ArgumentReference:
        this.checkBinding(expr.name, subject);
        return f.createIdentifier(expr.name);
      case CodeNodeKind.TypeReferenceExpression:
        return f.createIdentifier(this.referenceType(expr.type.name, subject));
      case CodeNodeKind.ObjectCreate:
        return f.createNewExpression(
          f.createIdentifier(this.referenceType(expr.type.name, subject)),
          this.typeArguments(expr.type, subject),
          expr.args.map((arg) => this.expression(arg, subject)),
        );
      case CodeNodeKind.MethodInvoke:
        this.checkIdentifier(expr.methodName, subject);
        return f.createCallExpression(
          f.createPropertyAccessExpression(
            this.expression(expr.target, subject),
            CLR_METHOD_TO_TYPESCRIPT.get(expr.methodName) ?? expr.methodName,
          ),
          undefined,
          expr.args.map((arg) => this.expression(arg, subject)),
        );
      case CodeNodeKind.BinaryOperator:
        return f.createBinaryExpression(
          this.operand(expr.left, subject),
          TS_OPERATORS[expr.operator],
          this.operand(expr.right, subject),
        );
      default:
        this.reportUnsupported(expr, subject);
        return f.createIdentifier("undefined");
    }
  }

  private operand(expr: CodeExpression, subject: string): ts.Expression {
    const node = this.expression(expr, subject);
    return expr.kind === CodeNodeKind.BinaryOperator
      ? f.createParenthesizedExpression(node)
      : node;
  }

  private primitive(value: PrimitiveValue, subject: string): ts.Expression {
    if (value === null) return f.createNull();
    if (typeof value === "string") return f.createStringLiteral(value);
    if (typeof value === "boolean") return value ? f.createTrue() : f.createFalse();
    if (!Number.isFinite(value)) {
      this.errors.add(
        new CodegenError(
          "UnsupportedNode",
          `Cannot emit non-finite number ${value}`,
          subject,
        ),
      );
      return f.createNumericLiteral(0);
    }
    return value < 0
      ? f.createPrefixUnaryExpression(
          ts.SyntaxKind.MinusToken,
          f.createNumericLiteral(-value),
        )
      : f.createNumericLiteral(value);
  }

  private typeNode(type: TypeReferenceNode, subject: string): ts.TypeNode {
    const keyword = KEYWORD_TYPES.get(toTypeScriptTypeName(type.name));
    if (keyword !== undefined) return f.createKeywordTypeNode(keyword);
    return f.createTypeReferenceNode(
      this.referenceType(type.name, subject),
      this.typeArguments(type, subject),
    );
  }

  private typeArguments(
    type: TypeReferenceNode,
    subject: string,
  ): ts.TypeNode[] | undefined {
    return type.typeArguments.length > 0
      ? type.typeArguments.map((arg) => this.typeNode(arg, subject))
      : undefined;
  }

  /**
   * Records a qualified type for import and returns the name to print
   */
  private referenceType(fullName: string, subject: string): string {
    const name = simpleTypeName(fullName);
    const ns = namespaceOf(fullName);
    if (ns === "" || ns === this.localNamespace) return name;
    const previous = this.referenced.get(name);
    if (previous === undefined) {
      this.referenced.set(name, fullName);
    } else if (previous !== fullName) {
      this.errors.add(
        new CodegenError(
          "UnsupportedNode",
          `Type name "${name}" refers to both ${previous} and ${fullName}`,
          subject,
        ),
      );
    }
    return name;
  }

  private checkIdentifier(name: string, subject: string): void {
    if (!isValidIdentifier(name)) {
      this.errors.add(
        new CodegenError(
          "InvalidIdentifier",
          `"${name}" is not a valid identifier`,
          subject,
        ),
      );
    }
  }

  /**
   * Names that declare or read a binding; member names may be reserved words
   */
  private checkBinding(name: string, subject: string): void {
    this.checkIdentifier(name, subject);
    if (isValidIdentifier(name) && isReservedWord(name, "typescript")) {
      this.errors.add(
        new CodegenError(
          "InvalidIdentifier",
          `"${name}" is a reserved word`,
          subject,
          "Choose a different name",
        ),
      );
    }
  }

  private reportUnsupported(node: CodeNode, subject: string): void {
    this.errors.add(
      new CodegenError(
        "UnsupportedNode",
        `Unsupported node kind: ${node.kind}`,
        subject,
      ),
    );
  }
}
