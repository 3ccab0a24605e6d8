/**
 * C# source emitter for the code AST
 */

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
  toCSharpTypeName,
} from "./type_names.js";

const INDENT = "    ";

const CSHARP_OPERATORS: Record<BinaryOperatorType, string> = {
  [BinaryOperatorType.IdentityEquality]: "==",
  [BinaryOperatorType.IdentityInequality]: "!=",
  [BinaryOperatorType.ValueEquality]: "==",
  [BinaryOperatorType.BooleanAnd]: "&&",
  [BinaryOperatorType.BooleanOr]: "||",
};

export function escapeCSharpString(value: string): string {
  let out = "";
  for (const ch of value) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        break;
      case '"':
        out += '\\"';
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\0":
        out += "\\0";
        break;
      default:
        out += ch;
    }
  }
  return `"${out}"`;
}

/**
 * Renders namespaces and classes as C# text
 */
export class CSharpEmitter {
  private errors = new ErrorCollector();
  private imports: ReadonlySet<string> = new Set();
  private lines: string[] = [];
  private depth = 0;

  emitNamespace(ns: NamespaceNode): string {
    this.reset(new Set(ns.imports));

    for (const imported of ns.imports) {
      this.checkQualifiedName(imported, imported);
      this.line(`using ${imported};`);
    }
    if (ns.imports.length > 0) this.line("");

    if (ns.name === "") {
      this.writeTypes(ns.types);
    } else {
      this.checkQualifiedName(ns.name, ns.name);
      this.line(`namespace ${ns.name}`);
      this.line("{");
      this.depth += 1;
      this.writeTypes(ns.types);
      this.depth -= 1;
      this.line("}");
    }

    return this.finish();
  }

  emitType(type: TypeDeclarationNode, imports: Iterable<string> = []): string {
    this.reset(new Set(imports));
    this.writeType(type);
    return this.finish();
  }

  private reset(imports: ReadonlySet<string>): void {
    this.errors = new ErrorCollector();
    this.imports = imports;
    this.lines = [];
    this.depth = 0;
  }

  private finish(): string {
    this.errors.throwIfErrors();
    return `${this.lines.join("\n")}\n`;
  }

  private line(text: string): void {
    this.lines.push(text === "" ? "" : INDENT.repeat(this.depth) + text);
  }

  private writeTypes(types: TypeDeclarationNode[]): void {
    types.forEach((type, index) => {
      if (index > 0) this.line("");
      this.writeType(type);
    });
  }

  private writeType(type: TypeDeclarationNode): void {
    this.checkIdentifier(type.name, type.name);
    const partial = type.isPartial ? " partial" : "";
    this.line(`${type.access}${partial} class ${type.name}`);
    this.line("{");
    this.depth += 1;
    type.members.forEach((member, index) => {
      if (index > 0) this.line("");
      this.writeMember(member, type.name);
    });
    this.depth -= 1;
    this.line("}");
  }

  private writeMember(member: CodeMember, owner: string): void {
    switch (member.kind) {
      case CodeNodeKind.MemberField:
        this.writeField(member, owner);
        break;
      case CodeNodeKind.MemberProperty:
        this.writeProperty(member, owner);
        break;
      case CodeNodeKind.MemberMethod:
        this.writeMethod(member, owner);
        break;
      default:
        this.reportUnsupported(member, owner);
    }
  }

  private modifiers(access: AccessModifier, isStatic: boolean): string {
    return isStatic ? `${access} static` : access;
  }

  private writeField(field: MemberFieldNode, owner: string): void {
    const subject = `${owner}.${field.name}`;
    this.checkIdentifier(field.name, subject);
    const init = field.initializer
      ? ` = ${this.expression(field.initializer, subject)}`
      : "";
    this.line(
      `${this.modifiers(field.access, field.isStatic)} ${this.typeName(field.type)} ${field.name}${init};`,
    );
  }

  private writeProperty(property: MemberPropertyNode, owner: string): void {
    const subject = `${owner}.${property.name}`;
    this.checkIdentifier(property.name, subject);
    this.line(
      `${property.access} ${this.typeName(property.type)} ${property.name}`,
    );
    this.line("{");
    this.depth += 1;
    if (property.hasGet) {
      this.line("get");
      this.writeBlock(property.getStatements, subject);
    }
    if (property.hasSet) {
      this.line("set");
      this.writeBlock(property.setStatements, subject);
    }
    this.depth -= 1;
    this.line("}");
  }

  private writeMethod(method: MemberMethodNode, owner: string): void {
    const subject = `${owner}.${method.name}`;
    this.checkIdentifier(method.name, subject);
    const params = method.parameters
      .map((param) => {
        this.checkIdentifier(param.name, subject);
        return `${this.typeName(param.type)} ${param.name}`;
      })
      .join(", ");
    this.line(
      `${this.modifiers(method.access, method.isStatic)} ${this.typeName(method.returnType)} ${method.name}(${params})`,
    );
    this.writeBlock(method.statements, subject);
  }

  private writeBlock(statements: CodeStatement[], subject: string): void {
    this.line("{");
    this.depth += 1;
    for (const statement of statements) {
      this.writeStatement(statement, subject);
    }
    this.depth -= 1;
    this.line("}");
  }

  private writeStatement(statement: CodeStatement, subject: string): void {
    switch (statement.kind) {
      case CodeNodeKind.VariableDeclaration: {
        this.checkIdentifier(statement.name, subject);
        const init = statement.initializer
          ? ` = ${this.expression(statement.initializer, subject)}`
          : "";
        this.line(`${this.typeName(statement.type)} ${statement.name}${init};`);
        break;
      }
      case CodeNodeKind.Assign:
        this.line(
          `${this.expression(statement.left, subject)} = ${this.expression(statement.right, subject)};`,
        );
        break;
      case CodeNodeKind.Condition:
        this.line(`if (${this.expression(statement.condition, subject)})`);
        this.writeBlock(statement.trueStatements, subject);
        if (statement.falseStatements.length > 0) {
          this.line("else");
          this.writeBlock(statement.falseStatements, subject);
        }
        break;
      case CodeNodeKind.Return:
        this.line(
          statement.expression
            ? `return ${this.expression(statement.expression, subject)};`
            : "return;",
        );
        break;
      case CodeNodeKind.ExpressionStatement:
        this.line(`${this.expression(statement.expression, subject)};`);
        break;
      default:
        this.reportUnsupported(statement, subject);
    }
  }

  private expression(expr: CodeExpression, subject: string): string {
    switch (expr.kind) {
      case CodeNodeKind.PrimitiveExpression:
        return this.primitive(expr.value, subject);
      case CodeNodeKind.ThisReference:
        return "this";
      case CodeNodeKind.FieldReference:
        this.checkIdentifier(expr.fieldName, subject);
        return `${this.expression(expr.target, subject)}.${expr.fieldName}`;
      case CodeNodeKind.PropertyReference:
        this.checkIdentifier(expr.propertyName, subject);
        return `${this.expression(expr.target, subject)}.${expr.propertyName}`;
      case CodeNodeKind.VariableReference:
      case CodeNodeKind.ArgumentReference:
        this.checkIdentifier(expr.name, subject);
        return expr.name;
      case CodeNodeKind.TypeReferenceExpression:
        return this.typeName(expr.type);
      case CodeNodeKind.ObjectCreate:
        return `new ${this.typeName(expr.type)}(${this.args(expr.args, subject)})`;
      case CodeNodeKind.MethodInvoke:
        this.checkIdentifier(expr.methodName, subject);
        return `${this.expression(expr.target, subject)}.${expr.methodName}(${this.args(expr.args, subject)})`;
      case CodeNodeKind.BinaryOperator:
        return `${this.operand(expr.left, subject)} ${CSHARP_OPERATORS[expr.operator]} ${this.operand(expr.right, subject)}`;
      default:
        this.reportUnsupported(expr, subject);
        return "";
    }
  }

  private operand(expr: CodeExpression, subject: string): string {
    const text = this.expression(expr, subject);
    return expr.kind === CodeNodeKind.BinaryOperator ? `(${text})` : text;
  }

  private args(args: CodeExpression[], subject: string): string {
    return args.map((arg) => this.expression(arg, subject)).join(", ");
  }

  private primitive(value: PrimitiveValue, subject: string): string {
    if (value === null) return "null";
    if (typeof value === "string") return escapeCSharpString(value);
    if (typeof value === "boolean") return value ? "true" : "false";
    if (!Number.isFinite(value)) {
      this.errors.add(
        new CodegenError(
          "UnsupportedNode",
          `Cannot emit non-finite number ${value}`,
          subject,
        ),
      );
      return "0";
    }
    return String(value);
  }

  private typeName(type: TypeReferenceNode): string {
    const name = toCSharpTypeName(type.name, this.imports);
    if (type.typeArguments.length === 0) return name;
    const args = type.typeArguments.map((arg) => this.typeName(arg));
    return `${name}<${args.join(", ")}>`;
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
    } else if (isReservedWord(name, "csharp")) {
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

  private checkQualifiedName(name: string, subject: string): void {
    for (const part of name.split(".")) {
      this.checkIdentifier(part, subject);
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
