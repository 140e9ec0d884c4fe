/**
 * Tests for the canonicalization rewriter
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  accessorDeclaration,
  accessorList,
  baseList,
  block,
  constraintClause,
  literal,
  parameterList,
  predefinedType,
  qualifiedName,
  separatedList,
  token,
  typeParameterList,
  withTrailing,
} from "./syntax/factory.js";
import { normalizeWhitespace } from "./syntax/normalize.js";
import { printNode } from "./syntax/printer.js";
import type {
  ClassDeclaration,
  ConstructorDeclaration,
  EnumDeclaration,
  EnumMemberDeclaration,
  IndexerDeclaration,
  InterfaceDeclaration,
  MemberDeclarationSyntax,
  MethodDeclaration,
  PropertyDeclaration,
  SimpleBaseType,
  TypeDeclarationSyntax,
  TypeSyntax,
} from "./syntax/types.js";
import { rewriteDeclaration } from "./rewriter.js";

const OBJECT = "global::System.Object";

const classDeclaration = (
  name: string,
  members: readonly MemberDeclarationSyntax[] = [],
  bases: readonly string[] = [OBJECT]
): ClassDeclaration => ({
  kind: "classDeclaration",
  attributeLists: [],
  modifiers: [token("public")],
  keyword: token("class"),
  identifier: token(name),
  ...(bases.length > 0
    ? { baseList: baseList(bases.map((b) => qualifiedName(b))) }
    : {}),
  constraintClauses: [],
  openBrace: token("{"),
  members,
  closeBrace: token("}"),
});

const method = (
  returnType: TypeSyntax,
  name: string,
  form: "body" | "semicolon" = "body",
  modifiers: readonly string[] = ["public"]
): MethodDeclaration => ({
  kind: "methodDeclaration",
  attributeLists: [],
  modifiers: modifiers.map((m) => token(m)),
  returnType,
  identifier: token(name),
  parameterList: parameterList([]),
  constraintClauses: [],
  ...(form === "body" ? { body: block() } : { semicolon: token(";") }),
});

const constructor = (name: string): ConstructorDeclaration => ({
  kind: "constructorDeclaration",
  attributeLists: [],
  modifiers: [token("public")],
  identifier: token(name),
  parameterList: parameterList([]),
  body: block(),
});

const property = (
  name: string,
  accessors: readonly (readonly [string, readonly string[]])[],
  modifiers: readonly string[] = ["public"]
): PropertyDeclaration => ({
  kind: "propertyDeclaration",
  attributeLists: [],
  modifiers: modifiers.map((m) => token(m)),
  type: predefinedType("int"),
  identifier: token(name),
  accessorList: accessorList(
    accessors.map(([keyword, own]) => accessorDeclaration(keyword, own))
  ),
});

const enumDeclaration = (
  name: string,
  members: readonly (readonly [string, string])[],
  underlying?: string
): EnumDeclaration => ({
  kind: "enumDeclaration",
  attributeLists: [],
  modifiers: [token("public")],
  enumKeyword: token("enum"),
  identifier: token(name),
  ...(underlying !== undefined
    ? { baseList: baseList([predefinedType(underlying)]) }
    : {}),
  openBrace: token("{"),
  members: separatedList(
    members.map(
      ([member, value]): EnumMemberDeclaration => ({
        kind: "enumMemberDeclaration",
        attributeLists: [],
        identifier: token(member),
        equalsValue: {
          kind: "equalsValueClause",
          equals: token("="),
          value: literal(value),
        },
      })
    )
  ),
  closeBrace: token("}"),
});

const canonical = (decl: TypeDeclarationSyntax): string =>
  printNode(rewriteDeclaration(normalizeWhitespace(decl)));

const lines = (...text: readonly string[]): string => [...text, ""].join("\n");

describe("rewriteDeclaration", () => {
  describe("base lists", () => {
    it("should drop a lone System.Object base and end the header after the identifier", () => {
      expect(canonical(classDeclaration("Foo"))).to.equal(
        lines("public class Foo", "{", "}")
      );
    });

    it("should drop System.Object ahead of interfaces", () => {
      const decl = classDeclaration("Foo", [], [OBJECT, "global::System.IDisposable"]);

      expect(canonical(decl)).to.equal(
        lines("public class Foo : System.IDisposable", "{", "}")
      );
    });

    it("should move the line break when System.Object was the last entry", () => {
      const decl = classDeclaration("Foo", [], ["global::System.IDisposable", OBJECT]);

      expect(canonical(decl)).to.equal(
        lines("public class Foo : System.IDisposable", "{", "}")
      );
    });

    it("should drop only the first System.Object entry", () => {
      const decl = classDeclaration("Foo", [], ["object", "System.Object"]);

      expect(canonical(decl)).to.equal(
        lines("public class Foo : System.Object", "{", "}")
      );
    });

    it("should end the header after the type parameters of a generic class", () => {
      const decl: ClassDeclaration = {
        ...classDeclaration("Box"),
        typeParameterList: typeParameterList([{ name: "T" }]),
      };

      expect(canonical(decl)).to.equal(lines("public class Box<T>", "{", "}"));
    });

    it("should end the header after the identifier when there never was a base list", () => {
      const normalized = normalizeWhitespace(classDeclaration("Bare", [], []));
      const messy =
        normalized.kind === "classDeclaration"
          ? { ...normalized, identifier: withTrailing(normalized.identifier, " ") }
          : normalized;

      expect(printNode(rewriteDeclaration(messy))).to.equal(
        lines("public class Bare", "{", "}")
      );
    });

    it("should keep constraint clauses ending the header", () => {
      const decl: ClassDeclaration = {
        ...classDeclaration("GenericClassWithConstraints"),
        typeParameterList: typeParameterList([{ name: "T" }]),
        constraintClauses: [
          constraintClause("T", [
            { kind: "keywordConstraint", keyword: token("class") },
          ]),
        ],
      };

      expect(canonical(decl)).to.equal(
        lines("public class GenericClassWithConstraints<T> where T : class", "{", "}")
      );
    });
  });

  describe("names", () => {
    it("should strip global:: from every segment boundary, type arguments included", () => {
      const decl = classDeclaration("Holder", [
        {
          kind: "fieldDeclaration",
          attributeLists: [],
          modifiers: [token("public")],
          type: qualifiedName("global::A.B", [qualifiedName("global::C")]),
          variables: separatedList([
            { kind: "variableDeclarator", identifier: token("Value") },
          ]),
          semicolon: token(";"),
        },
      ]);

      expect(canonical(decl)).to.equal(
        lines("public class Holder", "{", "    public A.B<C> Value;", "}")
      );
    });
  });

  describe("bodies", () => {
    it("should give constructors and void methods an empty body and others a throwing one", () => {
      const decl = classDeclaration("Class1", [
        constructor("Class1"),
        method(
          {
            kind: "nullableType",
            elementType: predefinedType("string"),
            questionToken: token("?"),
          },
          "Foo"
        ),
        method(predefinedType("void"), "Bar"),
      ]);

      expect(canonical(decl)).to.equal(
        lines(
          "public class Class1",
          "{",
          "    public Class1() { }",
          "    public string? Foo() { throw null; }",
          "    public void Bar() { }",
          "}"
        )
      );
    });

    it("should treat System.Void like void", () => {
      const decl = classDeclaration("Worker", [
        method(qualifiedName("System.Void"), "Run"),
      ]);

      expect(canonical(decl)).to.equal(
        lines("public class Worker", "{", "    public System.Void Run() { }", "}")
      );
    });

    it("should keep abstract methods in semicolon form", () => {
      const decl = classDeclaration("Shape", [
        method(predefinedType("double"), "Area", "semicolon", ["public", "abstract"]),
      ]);

      expect(canonical(decl)).to.equal(
        lines("public class Shape", "{", "    public abstract double Area();", "}")
      );
    });

    it("should replace expression bodies", () => {
      const expressionBodied: MethodDeclaration = {
        ...method(predefinedType("int"), "Answer"),
        body: undefined,
        expressionBody: {
          kind: "arrowExpressionClause",
          arrow: token("=>"),
          expression: literal("42"),
        },
        semicolon: token(";"),
      };

      expect(canonical(classDeclaration("Oracle", [expressionBodied]))).to.equal(
        lines("public class Oracle", "{", "    public int Answer() { throw null; }", "}")
      );
    });
  });

  describe("properties", () => {
    it("should collapse accessors onto the property line", () => {
      const decl = classDeclaration("Counter", [
        property("Count", [
          ["get", []],
          ["set", []],
        ]),
      ]);

      expect(canonical(decl)).to.equal(
        lines(
          "public class Counter",
          "{",
          "    public int Count { get { throw null; } set { } }",
          "}"
        )
      );
    });

    it("should keep accessor modifiers", () => {
      const decl = classDeclaration("Counter", [
        property("Count", [
          ["get", []],
          ["set", ["protected"]],
        ]),
      ]);

      expect(canonical(decl)).to.equal(
        lines(
          "public class Counter",
          "{",
          "    public int Count { get { throw null; } protected set { } }",
          "}"
        )
      );
    });

    it("should turn an expression-bodied property into a getter", () => {
      const answer: PropertyDeclaration = {
        kind: "propertyDeclaration",
        attributeLists: [],
        modifiers: [token("public")],
        type: predefinedType("int"),
        identifier: token("Answer"),
        expressionBody: {
          kind: "arrowExpressionClause",
          arrow: token("=>"),
          expression: literal("42"),
        },
        semicolon: token(";"),
      };

      expect(canonical(classDeclaration("Oracle", [answer]))).to.equal(
        lines("public class Oracle", "{", "    public int Answer { get { throw null; } }", "}")
      );
    });

    it("should keep accessors of abstract properties in semicolon form", () => {
      const decl = classDeclaration("Shape", [
        property("Sides", [["get", []]], ["public", "abstract"]),
      ]);

      expect(canonical(decl)).to.equal(
        lines("public class Shape", "{", "    public abstract int Sides { get; }", "}")
      );
    });

    it("should collapse indexer accessors after the bracket", () => {
      const indexer: IndexerDeclaration = {
        kind: "indexerDeclaration",
        attributeLists: [],
        modifiers: [token("public")],
        type: predefinedType("string"),
        thisKeyword: token("this"),
        parameterList: {
          kind: "bracketedParameterList",
          openBracket: token("["),
          parameters: separatedList([
            {
              kind: "parameter",
              attributeLists: [],
              modifiers: [],
              type: predefinedType("int"),
              identifier: token("index"),
            },
          ]),
          closeBracket: token("]"),
        },
        accessorList: accessorList([accessorDeclaration("get")]),
      };

      expect(canonical(classDeclaration("Table", [indexer]))).to.equal(
        lines(
          "public class Table",
          "{",
          "    public string this[int index] { get { throw null; } }",
          "}"
        )
      );
    });
  });

  describe("interfaces", () => {
    it("should keep body-less interface members abstract", () => {
      const shape: InterfaceDeclaration = {
        kind: "interfaceDeclaration",
        attributeLists: [],
        modifiers: [token("public")],
        keyword: token("interface"),
        identifier: token("IShape"),
        constraintClauses: [],
        openBrace: token("{"),
        members: [
          property("Sides", [["get", []]], []),
          method(predefinedType("double"), "Area", "semicolon", []),
        ],
        closeBrace: token("}"),
      };

      expect(canonical(shape)).to.equal(
        lines(
          "public interface IShape",
          "{",
          "    int Sides { get; }",
          "    double Area();",
          "}"
        )
      );
    });
  });

  describe("enums", () => {
    it("should keep an enum without an underlying type", () => {
      const decl = enumDeclaration("Color", [
        ["Red", "0"],
        ["Green", "1"],
      ]);

      expect(canonical(decl)).to.equal(
        lines("public enum Color", "{", "    Red = 0,", "    Green = 1", "}")
      );
    });

    it("should keep the underlying type of an enum", () => {
      const decl = enumDeclaration(
        "Range",
        [
          ["Min", "-9223372036854775808"],
          ["Max", "9223372036854775807"],
        ],
        "long"
      );

      expect(canonical(decl)).to.equal(
        lines(
          "public enum Range : long",
          "{",
          "    Min = -9223372036854775808,",
          "    Max = 9223372036854775807",
          "}"
        )
      );
    });
  });

  describe("structure", () => {
    it("should raise an internal error when a slot holds the wrong kind of node", () => {
      const entry: SimpleBaseType = {
        kind: "simpleBaseType",
        type: qualifiedName("global::System.IDisposable"),
      };
      const decl: ClassDeclaration = {
        ...classDeclaration("Broken", [], []),
        baseList: {
          kind: "baseList",
          colon: token(":"),
          types: separatedList([Object.assign({ ...entry }, { type: block() })]),
        },
      };

      expect(() => rewriteDeclaration(decl)).to.throw(
        /^ICE: Rewriting 'block' produced 'block' in a slot that does not accept it$/
      );
    });
  });

  it("should be idempotent", () => {
    const decl = classDeclaration(
      "Mixed",
      [
        constructor("Mixed"),
        method(predefinedType("int"), "Count"),
        property("Size", [
          ["get", []],
          ["set", []],
        ]),
      ],
      [OBJECT, "global::System.IDisposable"]
    );

    const plainEnum = enumDeclaration("Color", [["Red", "0"]]);
    const longEnum = enumDeclaration("Range", [["Max", "9223372036854775807"]], "long");

    for (const node of [decl, plainEnum, longEnum]) {
      const once = rewriteDeclaration(normalizeWhitespace(node));
      const twice = rewriteDeclaration(once);

      expect(printNode(twice)).to.equal(printNode(once));
    }
  });
});
