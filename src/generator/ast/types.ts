/**
 * Neutral code AST shared by decorators and emitters
 */

/**
 * Code node kinds
 */
export enum CodeNodeKind {
  Namespace = "Namespace",
  TypeDeclaration = "TypeDeclaration",
  MemberField = "MemberField",
  MemberProperty = "MemberProperty",
  MemberMethod = "MemberMethod",
  ParameterDeclaration = "ParameterDeclaration",
  TypeReference = "TypeReference",
  PrimitiveExpression = "PrimitiveExpression",
  ThisReference = "ThisReference",
  FieldReference = "FieldReference",
  PropertyReference = "PropertyReference",
  VariableReference = "VariableReference",
  ArgumentReference = "ArgumentReference",
  TypeReferenceExpression = "TypeReferenceExpression",
  ObjectCreate = "ObjectCreate",
  MethodInvoke = "MethodInvoke",
  BinaryOperator = "BinaryOperator",
  VariableDeclaration = "VariableDeclaration",
  Assign = "Assign",
  Condition = "Condition",
  Return = "Return",
  ExpressionStatement = "ExpressionStatement",
}

export type AccessModifier = "public" | "private" | "protected" | "internal";

export enum BinaryOperatorType {
  IdentityEquality = "IdentityEquality",
  IdentityInequality = "IdentityInequality",
  ValueEquality = "ValueEquality",
  BooleanAnd = "BooleanAnd",
  BooleanOr = "BooleanOr",
}

/**
 * Base code node
 */
export interface CodeNode {
  kind: CodeNodeKind;
}

/**
 * Reference to a type by its fully qualified name (e.g. "System.IO.TextWriter")
 */
export interface TypeReferenceNode extends CodeNode {
  kind: CodeNodeKind.TypeReference;
  name: string;
  typeArguments: TypeReferenceNode[];
}

export type PrimitiveValue = string | number | boolean | null;

export interface PrimitiveExpressionNode extends CodeNode {
  kind: CodeNodeKind.PrimitiveExpression;
  value: PrimitiveValue;
}

export interface ThisReferenceNode extends CodeNode {
  kind: CodeNodeKind.ThisReference;
}

export interface FieldReferenceNode extends CodeNode {
  kind: CodeNodeKind.FieldReference;
  target: CodeExpression;
  fieldName: string;
}

export interface PropertyReferenceNode extends CodeNode {
  kind: CodeNodeKind.PropertyReference;
  target: CodeExpression;
  propertyName: string;
}

/**
 * Local variable reference
 */
export interface VariableReferenceNode extends CodeNode {
  kind: CodeNodeKind.VariableReference;
  name: string;
}

/**
 * Method parameter reference
 */
export interface ArgumentReferenceNode extends CodeNode {
  kind: CodeNodeKind.ArgumentReference;
  name: string;
}

/**
 * A type used in expression position, e.g. the `JsonSerializer` in
 * `JsonSerializer.Create(settings)`
 */
export interface TypeReferenceExpressionNode extends CodeNode {
  kind: CodeNodeKind.TypeReferenceExpression;
  type: TypeReferenceNode;
}

export interface ObjectCreateNode extends CodeNode {
  kind: CodeNodeKind.ObjectCreate;
  type: TypeReferenceNode;
  args: CodeExpression[];
}

export interface MethodInvokeNode extends CodeNode {
  kind: CodeNodeKind.MethodInvoke;
  target: CodeExpression;
  methodName: string;
  args: CodeExpression[];
}

export interface BinaryOperatorNode extends CodeNode {
  kind: CodeNodeKind.BinaryOperator;
  operator: BinaryOperatorType;
  left: CodeExpression;
  right: CodeExpression;
}

export type CodeExpression =
  | PrimitiveExpressionNode
  | ThisReferenceNode
  | FieldReferenceNode
  | PropertyReferenceNode
  | VariableReferenceNode
  | ArgumentReferenceNode
  | TypeReferenceExpressionNode
  | ObjectCreateNode
  | MethodInvokeNode
  | BinaryOperatorNode;

export interface VariableDeclarationNode extends CodeNode {
  kind: CodeNodeKind.VariableDeclaration;
  type: TypeReferenceNode;
  name: string;
  initializer?: CodeExpression;
}

export interface AssignNode extends CodeNode {
  kind: CodeNodeKind.Assign;
  left: CodeExpression;
  right: CodeExpression;
}

/**
 * if / else statement
 */
export interface ConditionNode extends CodeNode {
  kind: CodeNodeKind.Condition;
  condition: CodeExpression;
  trueStatements: CodeStatement[];
  falseStatements: CodeStatement[];
}

export interface ReturnNode extends CodeNode {
  kind: CodeNodeKind.Return;
  expression?: CodeExpression;
}

export interface ExpressionStatementNode extends CodeNode {
  kind: CodeNodeKind.ExpressionStatement;
  expression: CodeExpression;
}

export type CodeStatement =
  | VariableDeclarationNode
  | AssignNode
  | ConditionNode
  | ReturnNode
  | ExpressionStatementNode;

export interface MemberFieldNode extends CodeNode {
  kind: CodeNodeKind.MemberField;
  name: string;
  type: TypeReferenceNode;
  access: AccessModifier;
  isStatic: boolean;
  initializer?: CodeExpression;
}

export interface MemberPropertyNode extends CodeNode {
  kind: CodeNodeKind.MemberProperty;
  name: string;
  type: TypeReferenceNode;
  access: AccessModifier;
  hasGet: boolean;
  hasSet: boolean;
  getStatements: CodeStatement[];
  setStatements: CodeStatement[];
}

export interface ParameterDeclarationNode extends CodeNode {
  kind: CodeNodeKind.ParameterDeclaration;
  name: string;
  type: TypeReferenceNode;
}

export interface MemberMethodNode extends CodeNode {
  kind: CodeNodeKind.MemberMethod;
  name: string;
  access: AccessModifier;
  isStatic: boolean;
  parameters: ParameterDeclarationNode[];
  returnType: TypeReferenceNode;
  statements: CodeStatement[];
}

export type CodeMember = MemberFieldNode | MemberPropertyNode | MemberMethodNode;

/**
 * Class declaration. Decorators append to `members`.
 */
export interface TypeDeclarationNode extends CodeNode {
  kind: CodeNodeKind.TypeDeclaration;
  name: string;
  access: AccessModifier;
  isPartial: boolean;
  members: CodeMember[];
}

export interface NamespaceNode extends CodeNode {
  kind: CodeNodeKind.Namespace;
  name: string;
  imports: string[];
  types: TypeDeclarationNode[];
}
