/**
 * Supplies an ObjectToJson method to generated services, backed by
 * Newtonsoft.Json's JsonSerializer
 */

import { type CodeFactory, codeFactory } from "../ast/factory.js";
import {
  BinaryOperatorType,
  type CodeStatement,
  type MemberFieldNode,
  type MemberMethodNode,
  type MemberPropertyNode,
  type TypeDeclarationNode,
} from "../ast/types.js";
import type { ServiceDescription } from "../discovery/service_description.js";
import type { ServiceDecorator } from "./service_decorator.js";

/**
 * Names shared by the field, property and method. The property reads the
 * field and the method calls through the property by these names.
 */
export interface ObjectToJsonNames {
  fieldName: string;
  propertyName: string;
  methodName: string;
  settingsVariable: string;
  writerVariable: string;
  parameterName: string;
}

export const DEFAULT_OBJECT_TO_JSON_NAMES: Readonly<ObjectToJsonNames> = {
  fieldName: "newtonJsonSerializer",
  propertyName: "NewtonJsonSerializer",
  methodName: "ObjectToJson",
  settingsVariable: "settings",
  writerVariable: "tw",
  parameterName: "obj",
};

export const NewtonsoftTypes = {
  JsonSerializer: "Newtonsoft.Json.JsonSerializer",
  JsonSerializerSettings: "Newtonsoft.Json.JsonSerializerSettings",
  NullValueHandling: "Newtonsoft.Json.NullValueHandling",
  TextWriter: "System.IO.TextWriter",
  StringWriter: "System.IO.StringWriter",
  Object: "System.Object",
  String: "System.String",
} as const;

/** Namespaces the generated members need imported */
export const OBJECT_TO_JSON_IMPORTS: readonly string[] = [
  "System",
  "System.IO",
  "Newtonsoft.Json",
];

/**
 * <code>private JsonSerializer newtonJsonSerializer = null;</code>
 */
export function buildSerializerField(
  f: CodeFactory = codeFactory,
  names: ObjectToJsonNames = DEFAULT_OBJECT_TO_JSON_NAMES,
): MemberFieldNode {
  return f.field({
    name: names.fieldName,
    type: f.typeRef(NewtonsoftTypes.JsonSerializer),
    access: "private",
    initializer: f.primitive(null),
  });
}

/**
 * <code>
 *   JsonSerializerSettings settings = new JsonSerializerSettings();
 *   settings.NullValueHandling = NullValueHandling.Ignore;
 *   this.newtonJsonSerializer = JsonSerializer.Create(settings);
 * </code>
 *
 * The settings are fully configured before they reach JsonSerializer.Create.
 */
export function buildSerializerCreationBlock(
  f: CodeFactory = codeFactory,
  names: ObjectToJsonNames = DEFAULT_OBJECT_TO_JSON_NAMES,
): CodeStatement[] {
  const settingsType = f.typeRef(NewtonsoftTypes.JsonSerializerSettings);

  const declareSettings = f.variableDeclaration(
    settingsType,
    names.settingsVariable,
    f.objectCreate(settingsType),
  );

  const ignoreNulls = f.assign(
    f.propertyRef(f.variableRef(names.settingsVariable), "NullValueHandling"),
    f.fieldRef(
      f.typeRefExpression(f.typeRef(NewtonsoftTypes.NullValueHandling)),
      "Ignore",
    ),
  );

  const createSerializer = f.assign(
    f.fieldRef(f.thisRef(), names.fieldName),
    f.methodInvoke(
      f.typeRefExpression(f.typeRef(NewtonsoftTypes.JsonSerializer)),
      "Create",
      [f.variableRef(names.settingsVariable)],
    ),
  );

  return [declareSettings, ignoreNulls, createSerializer];
}

/**
 * <code>
 *   private JsonSerializer NewtonJsonSerializer
 *   {
 *       get
 *       {
 *           if (this.newtonJsonSerializer == null)
 *           {
 *               ... // creation block
 *           }
 *           return this.newtonJsonSerializer;
 *       }
 *   }
 * </code>
 *
 * The emitted lazy initialisation is unsynchronised: the generated class
 * must not be used from several threads before the first call.
 */
export function buildSerializerProperty(
  f: CodeFactory = codeFactory,
  names: ObjectToJsonNames = DEFAULT_OBJECT_TO_JSON_NAMES,
): MemberPropertyNode {
  const isUnset = f.binary(
    f.fieldRef(f.thisRef(), names.fieldName),
    BinaryOperatorType.IdentityEquality,
    f.primitive(null),
  );

  return f.property({
    name: names.propertyName,
    type: f.typeRef(NewtonsoftTypes.JsonSerializer),
    access: "private",
    getStatements: [
      f.condition(isUnset, buildSerializerCreationBlock(f, names)),
      f.returnStatement(f.fieldRef(f.thisRef(), names.fieldName)),
    ],
  });
}

/**
 * <code>
 *   public string ObjectToJson(object obj)
 *   {
 *       TextWriter tw = new StringWriter();
 *       this.NewtonJsonSerializer.Serialize(tw, obj);
 *       return tw.ToString();
 *   }
 * </code>
 */
export function buildObjectToJsonMethod(
  f: CodeFactory = codeFactory,
  names: ObjectToJsonNames = DEFAULT_OBJECT_TO_JSON_NAMES,
): MemberMethodNode {
  const writer = f.variableRef(names.writerVariable);

  const declareWriter = f.variableDeclaration(
    f.typeRef(NewtonsoftTypes.TextWriter),
    names.writerVariable,
    f.objectCreate(f.typeRef(NewtonsoftTypes.StringWriter)),
  );

  // Goes through the property so the serializer is created on first use.
  const serialize = f.expressionStatement(
    f.methodInvoke(f.propertyRef(f.thisRef(), names.propertyName), "Serialize", [
      writer,
      f.argumentRef(names.parameterName),
    ]),
  );

  return f.method({
    name: names.methodName,
    access: "public",
    parameters: [
      f.parameter(f.typeRef(NewtonsoftTypes.Object), names.parameterName),
    ],
    returnType: f.typeRef(NewtonsoftTypes.String),
    statements: [
      declareWriter,
      serialize,
      f.returnStatement(f.methodInvoke(writer, "ToString")),
    ],
  });
}

export class NewtonsoftObjectToJson implements ServiceDecorator {
  constructor(
    private readonly factory: CodeFactory = codeFactory,
    private readonly names: ObjectToJsonNames = DEFAULT_OBJECT_TO_JSON_NAMES,
  ) {}

  createJsonSerializerField(): MemberFieldNode {
    return buildSerializerField(this.factory, this.names);
  }

  createSerializerCreationBlock(): CodeStatement[] {
    return buildSerializerCreationBlock(this.factory, this.names);
  }

  createJsonSerializerGetter(): MemberPropertyNode {
    return buildSerializerProperty(this.factory, this.names);
  }

  createObjectToJson(): MemberMethodNode {
    return buildObjectToJsonMethod(this.factory, this.names);
  }

  /**
   * Appends field, property and method, in that order. Calling this twice on
   * one class appends duplicate members; name collisions are checked by the
   * generator that runs the decorators.
   */
  decorateClass(
    _service: ServiceDescription,
    serviceClass: TypeDeclarationNode,
  ): void {
    serviceClass.members.push(this.createJsonSerializerField());
    serviceClass.members.push(this.createJsonSerializerGetter());
    serviceClass.members.push(this.createObjectToJson());
  }
}
