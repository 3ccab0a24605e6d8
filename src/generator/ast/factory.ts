import {
  type AccessModifier,
  type ArgumentReferenceNode,
  type AssignNode,
  type BinaryOperatorNode,
  type BinaryOperatorType,
  type CodeExpression,
  type CodeMember,
  CodeNodeKind,
  type CodeStatement,
  type ConditionNode,
  type ExpressionStatementNode,
  type FieldReferenceNode,
  type MemberFieldNode,
  type MemberMethodNode,
  type MemberPropertyNode,
  type MethodInvokeNode,
  type NamespaceNode,
  type ObjectCreateNode,
  type ParameterDeclarationNode,
  type PrimitiveExpressionNode,
  type PrimitiveValue,
  type PropertyReferenceNode,
  type ReturnNode,
  type ThisReferenceNode,
  type TypeDeclarationNode,
  type TypeReferenceExpressionNode,
  type TypeReferenceNode,
  type VariableDeclarationNode,
  type VariableReferenceNode,
} from "./types.js";

export interface FieldInit {
  name: string;
  type: TypeReferenceNode;
  access?: AccessModifier;
  isStatic?: boolean;
  initializer?: CodeExpression;
}

export interface PropertyInit {
  name: string;
  type: TypeReferenceNode;
  access?: AccessModifier;
  getStatements?: CodeStatement[];
  setStatements?: CodeStatement[];
}

export interface MethodInit {
  name: string;
  returnType: TypeReferenceNode;
  access?: AccessModifier;
  isStatic?: boolean;
  parameters?: ParameterDeclarationNode[];
  statements?: CodeStatement[];
}

export interface TypeDeclarationInit {
  name: string;
  access?: AccessModifier;
  isPartial?: boolean;
  members?: CodeMember[];
}

/**
 * Constructs code nodes. Builders receive a factory instead of creating
 * object literals so that callers can substitute their own.
 */
export interface CodeFactory {
  typeRef(name: string, typeArguments?: TypeReferenceNode[]): TypeReferenceNode;

  primitive(value: PrimitiveValue): PrimitiveExpressionNode;
  thisRef(): ThisReferenceNode;
  fieldRef(target: CodeExpression, fieldName: string): FieldReferenceNode;
  propertyRef(
    target: CodeExpression,
    propertyName: string,
  ): PropertyReferenceNode;
  variableRef(name: string): VariableReferenceNode;
  argumentRef(name: string): ArgumentReferenceNode;
  typeRefExpression(type: TypeReferenceNode): TypeReferenceExpressionNode;
  objectCreate(
    type: TypeReferenceNode,
    args?: CodeExpression[],
  ): ObjectCreateNode;
  methodInvoke(
    target: CodeExpression,
    methodName: string,
    args?: CodeExpression[],
  ): MethodInvokeNode;
  binary(
    left: CodeExpression,
    operator: BinaryOperatorType,
    right: CodeExpression,
  ): BinaryOperatorNode;

  variableDeclaration(
    type: TypeReferenceNode,
    name: string,
    initializer?: CodeExpression,
  ): VariableDeclarationNode;
  assign(left: CodeExpression, right: CodeExpression): AssignNode;
  condition(
    condition: CodeExpression,
    trueStatements: CodeStatement[],
    falseStatements?: CodeStatement[],
  ): ConditionNode;
  returnStatement(expression?: CodeExpression): ReturnNode;
  expressionStatement(expression: CodeExpression): ExpressionStatementNode;

  field(init: FieldInit): MemberFieldNode;
  property(init: PropertyInit): MemberPropertyNode;
  method(init: MethodInit): MemberMethodNode;
  parameter(type: TypeReferenceNode, name: string): ParameterDeclarationNode;
  typeDeclaration(init: TypeDeclarationInit): TypeDeclarationNode;
  namespace(
    name: string,
    imports?: readonly string[],
    types?: TypeDeclarationNode[],
  ): NamespaceNode;
}

export const codeFactory: CodeFactory = {
  typeRef: (name, typeArguments = []) => ({
    kind: CodeNodeKind.TypeReference,
    name,
    typeArguments,
  }),

  primitive: (value) => ({ kind: CodeNodeKind.PrimitiveExpression, value }),
  thisRef: () => ({ kind: CodeNodeKind.ThisReference }),
  fieldRef: (target, fieldName) => ({
    kind: CodeNodeKind.FieldReference,
    target,
    fieldName,
  }),
  propertyRef: (target, propertyName) => ({
    kind: CodeNodeKind.PropertyReference,
    target,
    propertyName,
  }),
  variableRef: (name) => ({ kind: CodeNodeKind.VariableReference, name }),
  argumentRef: (name) => ({ kind: CodeNodeKind.ArgumentReference, name }),
  typeRefExpression: (type) => ({
    kind: CodeNodeKind.TypeReferenceExpression,
    type,
  }),
  objectCreate: (type, args = []) => ({
    kind: CodeNodeKind.ObjectCreate,
    type,
    args,
  }),
  methodInvoke: (target, methodName, args = []) => ({
    kind: CodeNodeKind.MethodInvoke,
    target,
    methodName,
    args,
  }),
  binary: (left, operator, right) => ({
    kind: CodeNodeKind.BinaryOperator,
    operator,
    left,
    right,
  }),

  variableDeclaration: (type, name, initializer) => ({
    kind: CodeNodeKind.VariableDeclaration,
    type,
    name,
    initializer,
  }),
  assign: (left, right) => ({ kind: CodeNodeKind.Assign, left, right }),
  condition: (condition, trueStatements, falseStatements = []) => ({
    kind: CodeNodeKind.Condition,
    condition,
    trueStatements,
    falseStatements,
  }),
  returnStatement: (expression) => ({ kind: CodeNodeKind.Return, expression }),
  expressionStatement: (expression) => ({
    kind: CodeNodeKind.ExpressionStatement,
    expression,
  }),

  field: (init) => ({
    kind: CodeNodeKind.MemberField,
    name: init.name,
    type: init.type,
    access: init.access ?? "private",
    isStatic: init.isStatic ?? false,
    initializer: init.initializer,
  }),
  property: (init) => ({
    kind: CodeNodeKind.MemberProperty,
    name: init.name,
    type: init.type,
    access: init.access ?? "private",
    hasGet: init.getStatements !== undefined,
    hasSet: init.setStatements !== undefined,
    getStatements: init.getStatements ?? [],
    setStatements: init.setStatements ?? [],
  }),
  method: (init) => ({
    kind: CodeNodeKind.MemberMethod,
    name: init.name,
    access: init.access ?? "private",
    isStatic: init.isStatic ?? false,
    parameters: init.parameters ?? [],
    returnType: init.returnType,
    statements: init.statements ?? [],
  }),
  parameter: (type, name) => ({
    kind: CodeNodeKind.ParameterDeclaration,
    name,
    type,
  }),
  typeDeclaration: (init) => ({
    kind: CodeNodeKind.TypeDeclaration,
    name: init.name,
    access: init.access ?? "public",
    isPartial: init.isPartial ?? false,
    members: init.members ?? [],
  }),
  namespace: (name, imports = [], types = []) => ({
    kind: CodeNodeKind.Namespace,
    name,
    imports: [...imports],
    types,
  }),
};
