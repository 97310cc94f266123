import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";

import { createLogger } from "../src/infrastructure/frameworks/log.js";
import { CodeContextResolver } from "../src/infrastructure/source/CodeContextResolver.js";
import { SourceReadError, classNameToRelativePaths } from "../src/infrastructure/source/sourceFiles.js";
import {
  extractCodeContext,
  findEnclosingMethod,
  formatCodeContext,
  matchMethodDeclaration,
  splitSourceLines,
} from "../src/usecases/codeContext.js";

const SOURCE_ROOT = fileURLToPath(new URL("./fixtures/java", import.meta.url));
const ORDER_SERVICE_PATH = join(SOURCE_ROOT, "com", "example", "orders", "OrderService.java");

const cleanupPaths: string[] = [];

afterEach(async () => {
  while (cleanupPaths.length > 0) {
    const path = cleanupPaths.pop();
    if (!path) continue;
    await rm(path, { recursive: true, force: true });
  }
});

function captureLogger(scope: string) {
  const lines: string[] = [];
  const logger = createLogger(scope, { env: {}, write: (line) => lines.push(line) });
  return { lines, logger };
}

describe("Code context extraction", () => {
  it("resolves the enclosing class, method and window around a line", async () => {
    const resolver = new CodeContextResolver({ sourceRoots: [SOURCE_ROOT], contextLines: 3 });

    const context = await resolver.resolveByClass("com.example.orders.OrderService", 19);

    expect(context?.filePath).toBe(ORDER_SERVICE_PATH);
    expect(context?.className).toBe("OrderService");
    expect(context?.methodName).toBe("processOrder");
    expect(context?.startLine).toBe(16);
    expect(context?.endLine).toBe(22);
    expect(context?.surroundingLines).toHaveLength(7);
    expect(context?.surroundingLines[3].trim()).toBe(
      'throw new IllegalStateException("Order not found: " + orderId);',
    );
    expect(context?.methodBody?.split("\n")).toHaveLength(10);
    expect(context?.methodBody?.split("\n")[0].trim()).toBe("public Order processOrder(String orderId) {");
    expect(context?.imports).toEqual([
      "import java.util.List;",
      "import java.util.Map;",
      "import java.util.concurrent.ConcurrentHashMap;",
    ]);
    expect(context?.classFields).toEqual([
      "private static final int MAX_RETRIES = 3;",
      "private final Map<String, Order> orders = new ConcurrentHashMap<>();",
      "private final OrderRepository repository;",
    ]);
  });

  it("finds nested classes through their outer source file", async () => {
    const resolver = new CodeContextResolver({ sourceRoots: [SOURCE_ROOT] });

    const context = await resolver.resolveByClass("com.example.orders.OrderService$Validator", 28);

    expect(context?.methodName).toBe("pending");
    expect(context?.startLine).toBe(18);
    expect(context?.endLine).toBe(30);
  });

  it("searches by file name when only the file is known", async () => {
    const resolver = new CodeContextResolver({ sourceRoots: [SOURCE_ROOT] });

    const context = await resolver.resolveLocation({
      className: "com.example.relocated.OrderService",
      methodName: "processOrder",
      fileName: "OrderService.java",
      lineNumber: 17,
    });

    expect(context?.filePath).toBe(ORDER_SERVICE_PATH);
    expect(context?.methodName).toBe("processOrder");
  });

  it("returns nothing for a line outside the file and logs a warning", async () => {
    const { lines, logger } = captureLogger("code-context");
    const resolver = new CodeContextResolver({ sourceRoots: [SOURCE_ROOT], logger });

    const context = await resolver.resolveByClass("com.example.orders.OrderService", 9999);

    expect(context).toBeUndefined();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[tracelens] warn code-context: line number out of range");
    expect(lines[0]).toContain("lineNumber=9999 lineCount=30");
  });

  it("returns nothing when the class cannot be found or the line is unknown", async () => {
    const resolver = new CodeContextResolver({ sourceRoots: [SOURCE_ROOT] });

    expect(await resolver.resolveByClass("com.example.Missing", 3)).toBeUndefined();
    expect(
      await resolver.resolveLocation({
        className: "com.example.orders.OrderService",
        methodName: null,
        fileName: null,
        lineNumber: null,
      }),
    ).toBeUndefined();
  });

  it("reports read failures other than a missing file", async () => {
    const tempRoot = await mkdtemp(join(tmpdir(), "tracelens-context-"));
    cleanupPaths.push(tempRoot);
    const directory = join(tempRoot, "Broken.java");
    await mkdir(directory);

    const resolver = new CodeContextResolver({ sourceRoots: [tempRoot] });

    await expect(resolver.resolveFromFile(directory, 1)).rejects.toBeInstanceOf(SourceReadError);
    expect(await resolver.resolveFromFile(join(tempRoot, "Absent.java"), 1)).toBeUndefined();
  });

  it("reads files from several roots and extensions", async () => {
    const tempRoot = await mkdtemp(join(tmpdir(), "tracelens-roots-"));
    cleanupPaths.push(tempRoot);
    await mkdir(join(tempRoot, "com", "example"), { recursive: true });
    await writeFile(
      join(tempRoot, "com", "example", "Greeter.kt"),
      ["package com.example", "", "class Greeter {", "    fun greet() = \"hi\"", "}", ""].join("\n"),
      "utf8",
    );

    const resolver = new CodeContextResolver({
      sourceRoots: [SOURCE_ROOT, tempRoot],
      sourceExtensions: [".java", ".kt"],
      contextLines: 1,
    });
    const context = await resolver.resolveByClass("com.example.Greeter", 4);

    expect(context?.className).toBe("Greeter");
    expect(context?.surroundingLines).toEqual(["class Greeter {", '    fun greet() = "hi"', "}"]);
  });
});

describe("Source text helpers", () => {
  it("maps class names to relative source paths", () => {
    expect(classNameToRelativePaths("com.example.Outer$Inner", [".java"])).toEqual([
      join("com", "example", "Outer.java"),
    ]);
  });

  it("skips statements that look like declarations", () => {
    expect(matchMethodDeclaration("    return compute(value);")).toBeUndefined();
    expect(matchMethodDeclaration("    throw new IllegalStateException(message);")).toBeUndefined();
    expect(matchMethodDeclaration("    public static <T> List<T> wrap(T value) {")).toBe("wrap");
  });

  it("reads annotated methods and nested generic return types", () => {
    expect(matchMethodDeclaration("    @Override public void run() {")).toBe("run");
    expect(matchMethodDeclaration('    @GetMapping("/orders") public List<Order> list() {')).toBe("list");
    expect(matchMethodDeclaration("    Map<String, List<Order>> group(List<Order> orders) {")).toBe("group");
  });

  it("does not read a record header as a method", () => {
    const lines = ["public record Point(int x, int y) {", "    static int origin = 0;", "}"];

    expect(matchMethodDeclaration(lines[0])).toBeUndefined();
    expect(findEnclosingMethod(lines, 2)).toBeUndefined();
  });

  it("does not attribute a line between methods to the method above", () => {
    const lines = [
      "class Sample {",
      "    void first() {",
      "        work();",
      "    }",
      "",
      "    int counter = 0;",
      "}",
    ];

    expect(findEnclosingMethod(lines, 6)).toBeUndefined();
    expect(findEnclosingMethod(lines, 3)).toEqual({ methodName: "first", startLine: 2, endLine: 4 });
  });

  it("stops at a nested class or initializer that encloses the line", () => {
    const nested = [
      "class Outer {",
      "    void first() {",
      "        work();",
      "    }",
      "    static class Inner {",
      "        int counter = 0;",
      "    }",
      "}",
    ];
    const initializer = [
      "class Outer {",
      "    void first() {",
      "        work();",
      "    }",
      "    static {",
      "        counter = 1;",
      "    }",
      "}",
    ];

    expect(findEnclosingMethod(nested, 6)).toBeUndefined();
    expect(findEnclosingMethod(initializer, 6)).toBeUndefined();
  });

  it("attributes lines in an anonymous class to its own method", () => {
    const lines = [
      "class Outer {",
      "    void first() {",
      "        work();",
      "    }",
      "    Runnable task = new Runnable() {",
      "        @Override public void run() {",
      "            go();",
      "        }",
      "    };",
      "}",
    ];

    expect(findEnclosingMethod(lines, 7)).toEqual({ methodName: "run", startLine: 6, endLine: 8 });
  });

  it("finds a method whose return type has nested generics", () => {
    const lines = [
      "class Outer {",
      "    void first() {",
      "        work();",
      "    }",
      "    Map<String, List<Order>> group(List<Order> orders) {",
      "        return index(orders);",
      "    }",
      "}",
    ];

    const context = extractCodeContext("Outer.java", lines, 6, 1);

    expect(context?.methodName).toBe("group");
    expect(context?.methodBody?.split("\n")).toEqual(lines.slice(4, 7));
  });

  it("looks through control blocks and braces on their own line", () => {
    const branches = [
      "class Sample {",
      "    void pick(boolean a) {",
      "        if (a) {",
      "            left();",
      "        } else {",
      "            right();",
      "        }",
      "    }",
      "}",
    ];
    const allman = [
      "class Sample",
      "{",
      "    void first()",
      "    {",
      "        if (ready)",
      "        {",
      "            work();",
      "        }",
      "    }",
      "}",
    ];

    expect(findEnclosingMethod(branches, 5)).toEqual({ methodName: "pick", startLine: 2, endLine: 8 });
    expect(findEnclosingMethod(branches, 6)?.methodName).toBe("pick");
    expect(findEnclosingMethod(allman, 7)).toEqual({ methodName: "first", startLine: 3, endLine: 9 });
  });

  it("drops the empty line after a trailing newline", () => {
    expect(splitSourceLines("a\r\nb\n")).toEqual(["a", "b"]);
  });

  it("marks the target line in the numbered excerpt", () => {
    const context = extractCodeContext("Sample.java", ["class Sample {", "    int x;", "}"], 2, 1);

    expect(context ? formatCodeContext(context).split("\n") : []).toEqual([
      "        1 | class Sample {",
      " >>>    2 |     int x;",
      "        3 | }",
    ]);
  });
});
