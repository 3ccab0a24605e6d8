/**
 * Unit tests for the ObjectToJson decorator and its member builders
 */

import { describe, expect, it, vi } from "vitest";
import { type CodeFactory, codeFactory as f } from "../../../src/generator/ast/factory.js";
import {
  BinaryOperatorType,
  CodeNodeKind,
} from "../../../src/generator/ast/types.js";
import {
  buildObjectToJsonMethod,
  buildSerializerCreationBlock,
  buildSerializerField,
  buildSerializerProperty,
  DEFAULT_OBJECT_TO_JSON_NAMES,
  NewtonsoftObjectToJson,
  type ObjectToJsonNames,
} from "../../../src/generator/decorators/newtonsoft_object_to_json.js";

const serializerType = f.typeRef("Newtonsoft.Json.JsonSerializer");
const thisField = () => f.fieldRef(f.thisRef(), "newtonJsonSerializer");

describe("DEFAULT_OBJECT_TO_JSON_NAMES", () => {
  it("names the generated members and locals", () => {
    expect(DEFAULT_OBJECT_TO_JSON_NAMES).toEqual({
      fieldName: "newtonJsonSerializer",
      propertyName: "NewtonJsonSerializer",
      methodName: "ObjectToJson",
      settingsVariable: "settings",
      writerVariable: "tw",
      parameterName: "obj",
    });
  });
});

describe("buildSerializerField", () => {
  it("declares a private JsonSerializer field initialised to null", () => {
    expect(buildSerializerField()).toEqual({
      kind: CodeNodeKind.MemberField,
      name: "newtonJsonSerializer",
      type: serializerType,
      access: "private",
      isStatic: false,
      initializer: { kind: CodeNodeKind.PrimitiveExpression, value: null },
    });
  });

  it("returns structurally identical nodes on repeated calls", () => {
    const first = buildSerializerField();
    const second = buildSerializerField();
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("builds through the supplied factory", () => {
    const primitive = vi.fn(f.primitive);
    const factory: CodeFactory = { ...f, primitive };
    buildSerializerField(factory);
    expect(primitive).toHaveBeenCalledWith(null);
  });
});

describe("buildSerializerCreationBlock", () => {
  it("returns declare, configure and create statements in order", () => {
    const settingsType = f.typeRef("Newtonsoft.Json.JsonSerializerSettings");
    expect(buildSerializerCreationBlock()).toEqual([
      f.variableDeclaration(settingsType, "settings", f.objectCreate(settingsType)),
      f.assign(
        f.propertyRef(f.variableRef("settings"), "NullValueHandling"),
        f.fieldRef(
          f.typeRefExpression(f.typeRef("Newtonsoft.Json.NullValueHandling")),
          "Ignore",
        ),
      ),
      f.assign(
        thisField(),
        f.methodInvoke(f.typeRefExpression(serializerType), "Create", [
          f.variableRef("settings"),
        ]),
      ),
    ]);
  });

  it("always sets the ignore-nulls flag", () => {
    const [, configure] = buildSerializerCreationBlock();
    expect(configure).toMatchObject({
      kind: CodeNodeKind.Assign,
      left: { propertyName: "NullValueHandling" },
      right: {
        kind: CodeNodeKind.FieldReference,
        fieldName: "Ignore",
        target: { type: { name: "Newtonsoft.Json.NullValueHandling" } },
      },
    });
  });

  it("passes the configured settings variable to JsonSerializer.Create", () => {
    const names: ObjectToJsonNames = {
      ...DEFAULT_OBJECT_TO_JSON_NAMES,
      settingsVariable: "jsonSettings",
    };
    const [declare, configure, create] = buildSerializerCreationBlock(f, names);
    expect(declare).toMatchObject({ name: "jsonSettings" });
    expect(configure).toMatchObject({
      left: { target: { name: "jsonSettings" } },
    });
    expect(create).toMatchObject({
      right: { methodName: "Create", args: [f.variableRef("jsonSettings")] },
    });
  });
});

describe("buildSerializerProperty", () => {
  it("declares a private get-only JsonSerializer property", () => {
    const property = buildSerializerProperty();
    expect(property.kind).toBe(CodeNodeKind.MemberProperty);
    expect(property.name).toBe("NewtonJsonSerializer");
    expect(property.type).toEqual(serializerType);
    expect(property.access).toBe("private");
    expect(property.hasGet).toBe(true);
    expect(property.hasSet).toBe(false);
    expect(property.setStatements).toEqual([]);
  });

  it("initialises the field lazily and returns it", () => {
    expect(buildSerializerProperty().getStatements).toEqual([
      f.condition(
        f.binary(
          thisField(),
          BinaryOperatorType.IdentityEquality,
          f.primitive(null),
        ),
        buildSerializerCreationBlock(),
      ),
      f.returnStatement(thisField()),
    ]);
  });

  it("guards and returns the field named in the shared names", () => {
    const names: ObjectToJsonNames = {
      ...DEFAULT_OBJECT_TO_JSON_NAMES,
      fieldName: "jsonSerializer",
    };
    const field = buildSerializerField(f, names);
    const property = buildSerializerProperty(f, names);
    const fieldRef = f.fieldRef(f.thisRef(), field.name);
    expect(property.getStatements[0]).toMatchObject({
      condition: { left: fieldRef },
    });
    expect(property.getStatements[1]).toEqual(f.returnStatement(fieldRef));
  });
});

describe("buildObjectToJsonMethod", () => {
  it("has the signature public string ObjectToJson(object obj)", () => {
    const method = buildObjectToJsonMethod();
    expect(method.name).toBe("ObjectToJson");
    expect(method.access).toBe("public");
    expect(method.isStatic).toBe(false);
    expect(method.parameters).toEqual([
      f.parameter(f.typeRef("System.Object"), "obj"),
    ]);
    expect(method.returnType).toEqual(f.typeRef("System.String"));
  });

  it("writes into a StringWriter and returns its text", () => {
    expect(buildObjectToJsonMethod().statements).toEqual([
      f.variableDeclaration(
        f.typeRef("System.IO.TextWriter"),
        "tw",
        f.objectCreate(f.typeRef("System.IO.StringWriter")),
      ),
      f.expressionStatement(
        f.methodInvoke(
          f.propertyRef(f.thisRef(), "NewtonJsonSerializer"),
          "Serialize",
          [f.variableRef("tw"), f.argumentRef("obj")],
        ),
      ),
      f.returnStatement(f.methodInvoke(f.variableRef("tw"), "ToString")),
    ]);
  });

  it("calls Serialize on the lazy property rather than on this", () => {
    const names: ObjectToJsonNames = {
      ...DEFAULT_OBJECT_TO_JSON_NAMES,
      propertyName: "Serializer",
    };
    const property = buildSerializerProperty(f, names);
    const [, serialize] = buildObjectToJsonMethod(f, names).statements;
    expect(serialize).toMatchObject({
      expression: {
        methodName: "Serialize",
        target: f.propertyRef(f.thisRef(), property.name),
      },
    });
    expect(serialize).not.toMatchObject({
      expression: { target: f.thisRef() },
    });
  });
});

describe("NewtonsoftObjectToJson.decorateClass", () => {
  it("appends field, property and method to an empty class", () => {
    const cls = f.typeDeclaration({ name: "BooksService" });
    new NewtonsoftObjectToJson().decorateClass({ name: "books" }, cls);

    expect(cls.members.map((m) => m.kind)).toEqual([
      CodeNodeKind.MemberField,
      CodeNodeKind.MemberProperty,
      CodeNodeKind.MemberMethod,
    ]);
    expect(cls.members.map((m) => m.name)).toEqual([
      "newtonJsonSerializer",
      "NewtonJsonSerializer",
      "ObjectToJson",
    ]);
  });

  it("keeps existing members in front", () => {
    const existing = f.method({
      name: "Execute",
      access: "public",
      returnType: f.typeRef("System.Void"),
    });
    const cls = f.typeDeclaration({ name: "BooksService", members: [existing] });
    new NewtonsoftObjectToJson().decorateClass({ name: "books" }, cls);

    expect(cls.members).toHaveLength(4);
    expect(cls.members[0]).toBe(existing);
    expect(cls.members[1]?.name).toBe("newtonJsonSerializer");
  });

  it("produces the same members whatever the service description", () => {
    const decorator = new NewtonsoftObjectToJson();
    const a = f.typeDeclaration({ name: "AService" });
    const b = f.typeDeclaration({ name: "BService" });
    decorator.decorateClass({ name: "books", version: "v1" }, a);
    decorator.decorateClass(
      { name: "calendar", title: "Calendar API", description: "Events" },
      b,
    );
    expect(b.members).toEqual(a.members);
  });

  it("appends duplicates when applied twice", () => {
    const cls = f.typeDeclaration({ name: "BooksService" });
    const decorator = new NewtonsoftObjectToJson();
    decorator.decorateClass({ name: "books" }, cls);
    decorator.decorateClass({ name: "books" }, cls);

    expect(cls.members.map((m) => m.name)).toEqual([
      "newtonJsonSerializer",
      "NewtonJsonSerializer",
      "ObjectToJson",
      "newtonJsonSerializer",
      "NewtonJsonSerializer",
      "ObjectToJson",
    ]);
  });

  it("uses the names it was constructed with", () => {
    const names: ObjectToJsonNames = {
      ...DEFAULT_OBJECT_TO_JSON_NAMES,
      fieldName: "serializer",
      propertyName: "Serializer",
      methodName: "ToJson",
    };
    const cls = f.typeDeclaration({ name: "BooksService" });
    new NewtonsoftObjectToJson(f, names).decorateClass({ name: "books" }, cls);
    expect(cls.members.map((m) => m.name)).toEqual([
      "serializer",
      "Serializer",
      "ToJson",
    ]);
  });
});
