import { describe, expect, it } from "vitest";
import { codeFactory as f } from "../../../src/generator/ast/factory.js";
import { BinaryOperatorType } from "../../../src/generator/ast/types.js";
import {
  DEFAULT_OBJECT_TO_JSON_NAMES,
  NewtonsoftObjectToJson,
  OBJECT_TO_JSON_IMPORTS,
} from "../../../src/generator/decorators/newtonsoft_object_to_json.js";
import {
  CSharpEmitter,
  escapeCSharpString,
} from "../../../src/generator/emit/csharp_emitter.js";
import { AggregateCodegenError } from "../../../src/generator/errors/codegen_errors.js";

function decoratedClass(name = "BooksService") {
  const cls = f.typeDeclaration({ name });
  new NewtonsoftObjectToJson().decorateClass({ name: "books" }, cls);
  return cls;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("CSharpEmitter", () => {
  it("emits the decorated class with usings and a namespace", () => {
    const ns = f.namespace("Generated.Apis", OBJECT_TO_JSON_IMPORTS, [
      decoratedClass(),
    ]);
    const expected = [
      "using System;",
      "using System.IO;",
      "using Newtonsoft.Json;",
      "",
      "namespace Generated.Apis",
      "{",
      "    public class BooksService",
      "    {",
      "        private JsonSerializer newtonJsonSerializer = null;",
      "",
      "        private JsonSerializer NewtonJsonSerializer",
      "        {",
      "            get",
      "            {",
      "                if (this.newtonJsonSerializer == null)",
      "                {",
      "                    JsonSerializerSettings settings = new JsonSerializerSettings();",
      "                    settings.NullValueHandling = NullValueHandling.Ignore;",
      "                    this.newtonJsonSerializer = JsonSerializer.Create(settings);",
      "                }",
      "                return this.newtonJsonSerializer;",
      "            }",
      "        }",
      "",
      "        public string ObjectToJson(object obj)",
      "        {",
      "            TextWriter tw = new StringWriter();",
      "            this.NewtonJsonSerializer.Serialize(tw, obj);",
      "            return tw.ToString();",
      "        }",
      "    }",
      "}",
      "",
    ].join("\n");

    expect(new CSharpEmitter().emitNamespace(ns)).toBe(expected);
  });

  it("qualifies type names whose namespace is not imported", () => {
    const lines = new CSharpEmitter().emitType(decoratedClass()).split("\n");
    expect(lines[2]).toBe(
      "    private Newtonsoft.Json.JsonSerializer newtonJsonSerializer = null;",
    );
    expect(lines).toContain(
      "        System.IO.TextWriter tw = new System.IO.StringWriter();",
    );
    expect(lines).toContain("    public string ObjectToJson(object obj)");
  });

  it("omits the namespace block for an empty namespace name", () => {
    const ns = f.namespace("", [], [f.typeDeclaration({ name: "Empty", isPartial: true })]);
    expect(new CSharpEmitter().emitNamespace(ns)).toBe(
      "public partial class Empty\n{\n}\n",
    );
  });

  it("parenthesises nested binary operands and emits else branches", () => {
    const value = f.argumentRef("value");
    const method = f.method({
      name: "IsBlank",
      access: "public",
      isStatic: true,
      parameters: [f.parameter(f.typeRef("System.String"), "value")],
      returnType: f.typeRef("System.Boolean"),
      statements: [
        f.condition(
          f.binary(
            f.binary(value, BinaryOperatorType.IdentityEquality, f.primitive(null)),
            BinaryOperatorType.BooleanOr,
            f.binary(value, BinaryOperatorType.ValueEquality, f.primitive("")),
          ),
          [f.returnStatement(f.primitive(true))],
          [f.returnStatement(f.primitive(false))],
        ),
      ],
    });
    const cls = f.typeDeclaration({ name: "Strings", members: [method] });

    expect(new CSharpEmitter().emitType(cls)).toBe(
      [
        "public class Strings",
        "{",
        "    public static bool IsBlank(string value)",
        "    {",
        '        if ((value == null) || (value == ""))',
        "        {",
        "            return true;",
        "        }",
        "        else",
        "        {",
        "            return false;",
        "        }",
        "    }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("emits generic type arguments", () => {
    const field = f.field({
      name: "cache",
      type: f.typeRef("System.Collections.Generic.Dictionary", [
        f.typeRef("System.String"),
        f.typeRef("System.Int32"),
      ]),
    });
    const cls = f.typeDeclaration({ name: "Cache", members: [field] });
    const lines = new CSharpEmitter().emitType(cls, ["System.Collections.Generic"]).split("\n");
    expect(lines[2]).toBe("    private Dictionary<string, int> cache;");
  });

  it("reports every invalid identifier at once", () => {
    const cls = f.typeDeclaration({
      name: "Books Service",
      members: [
        f.field({ name: "2nd", type: f.typeRef("System.Int32") }),
      ],
    });
    const err = captureError(() => new CSharpEmitter().emitType(cls));

    expect(err).toBeInstanceOf(AggregateCodegenError);
    expect(err).toMatchObject({
      errors: [
        { code: "InvalidIdentifier", subject: "Books Service" },
        { code: "InvalidIdentifier", subject: "Books Service.2nd" },
      ],
    });
  });

  it("rejects a reserved word once per member that uses it", () => {
    const cls = f.typeDeclaration({ name: "BooksService" });
    new NewtonsoftObjectToJson(f, {
      ...DEFAULT_OBJECT_TO_JSON_NAMES,
      fieldName: "object",
    }).decorateClass({ name: "books" }, cls);
    const err = captureError(() => new CSharpEmitter().emitType(cls));

    expect(err).toBeInstanceOf(AggregateCodegenError);
    expect(err).toMatchObject({
      errors: [
        {
          code: "InvalidIdentifier",
          subject: "BooksService.object",
          message: '"object" is a reserved word',
        },
        {
          code: "InvalidIdentifier",
          subject: "BooksService.NewtonJsonSerializer",
          message: '"object" is a reserved word',
        },
      ],
    });
    expect(err).toHaveProperty("errors.length", 2);
  });

  it("rejects reserved words in namespace and using names", () => {
    const ns = f.namespace("Generated.params", ["System.event"], []);
    expect(() => new CSharpEmitter().emitNamespace(ns)).toThrow(
      [
        "Code generation failed with 2 error(s):",
        `- [InvalidIdentifier] System.event: "event" is a reserved word (hint: Choose a different name)`,
        `- [InvalidIdentifier] Generated.params: "params" is a reserved word (hint: Choose a different name)`,
      ].join("\n"),
    );
  });

  it("rejects non-finite numbers", () => {
    const cls = f.typeDeclaration({
      name: "Limits",
      members: [
        f.field({
          name: "max",
          type: f.typeRef("System.Double"),
          initializer: f.primitive(Number.POSITIVE_INFINITY),
        }),
      ],
    });
    const err = captureError(() => new CSharpEmitter().emitType(cls));
    expect(err).toMatchObject({
      errors: [{ code: "UnsupportedNode", subject: "Limits.max" }],
    });
  });

  it("can be reused after a failure", () => {
    const emitter = new CSharpEmitter();
    captureError(() => emitter.emitType(f.typeDeclaration({ name: "bad name" })));
    expect(emitter.emitType(f.typeDeclaration({ name: "Good" }))).toBe(
      "public class Good\n{\n}\n",
    );
  });
});

describe("escapeCSharpString", () => {
  it("escapes quotes, backslashes and control characters", () => {
    expect(escapeCSharpString('say "hi"\\\n\t')).toBe('"say \\"hi\\"\\\\\\n\\t"');
  });
});
