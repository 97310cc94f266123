import { describe, expect, it } from "vitest";

import type { LogRecord } from "../src/interfaces/index.js";
import {
  computeShortId,
  createFingerprintEngine,
  EMPTY_MESSAGE_FINGERPRINT,
  normalizeMessage,
} from "../src/usecases/fingerprinting.js";
import { createFrameClassifier } from "../src/usecases/frameClassification.js";

const ORDER_TRACE = [
  "java.lang.IllegalStateException: Order not found: 42",
  "\tat com.example.orders.OrderService.processOrder(OrderService.java:19)",
  "\tat com.example.orders.OrderController.submit(OrderController.java:31)",
  "\tat org.springframework.web.servlet.FrameworkServlet.service(FrameworkServlet.java:897)",
].join("\n");

function errorRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    timestamp: "2026-03-01T10:00:00.000Z",
    level: "ERROR",
    message: "Order not found: 42",
    ...overrides,
  };
}

describe("Message normalization", () => {
  it("replaces identifiers with placeholders", () => {
    expect(normalizeMessage("Failed to process order 123e4567-e89b-12d3-a456-426614174000")).toBe(
      "Failed to process order <UUID>",
    );
    expect(normalizeMessage("User 1234567 logged in from 10.0.0.12 at 2026-05-01T10:15:30Z")).toBe(
      "User <ID> logged in from <IP> at <TIMESTAMP>",
    );
    expect(normalizeMessage("Mail to jane.doe@example.com bounced")).toBe("Mail to <EMAIL> bounced");
    expect(normalizeMessage(`Key "tenant-a" missing in 'eu-west'`)).toBe(`Key "<STRING>" missing in '<STRING>'`);
  });

  it("hides ids and UUIDs in short messages", () => {
    expect(normalizeMessage("User 12345678 not found")).toBe("User <ID> not found");
    expect(normalizeMessage("id a1b2c3d4-e5f6-7890-abcd-ef1234567890 failed")).toBe("id <UUID> failed");
  });

  it("matches upper-case UUIDs and leaves short numbers alone", () => {
    expect(normalizeMessage("Session 123E4567-E89B-12D3-A456-426614174000 expired after 30 attempts")).toBe(
      "Session <UUID> expired after 30 attempts",
    );
  });

  it("trims and treats missing messages as empty", () => {
    expect(normalizeMessage("  padded  ")).toBe("padded");
    expect(normalizeMessage(null)).toBe("");
    expect(normalizeMessage(undefined)).toBe("");
  });
});

describe("Short cluster ids", () => {
  it("formats the hash as eight upper-case hex digits", () => {
    expect(computeShortId("Aa")).toBe("ERR-00000840");
    expect(computeShortId("")).toBe("ERR-00000000");
    expect(computeShortId("java.lang.IllegalStateException|x")).toMatch(/^ERR-[0-9A-F]{8}$/);
  });

  it("can collide for distinct fingerprints", () => {
    expect(computeShortId("BB")).toBe(computeShortId("Aa"));
  });
});

describe("Record fingerprinting", () => {
  it("uses the exception type and leading application frames when a trace is present", () => {
    const engine = createFingerprintEngine();

    const described = engine.describeRecord(errorRecord({ stackTrace: ORDER_TRACE }));

    expect(described.tier).toBe("trace");
    expect(described.fingerprint).toBe(
      "java.lang.IllegalStateException|com.example.orders.OrderService.processOrder:19|com.example.orders.OrderController.submit:31",
    );
    expect(described.trace?.exceptionType).toBe("java.lang.IllegalStateException");
  });

  it("limits the trace fingerprint to the configured frame count", () => {
    const engine = createFingerprintEngine({ frameCount: 1 });

    expect(engine.fingerprint(errorRecord({ stackTrace: ORDER_TRACE }))).toBe(
      "java.lang.IllegalStateException|com.example.orders.OrderService.processOrder:19",
    );
  });

  it("is deterministic and ignores the message when a trace is present", () => {
    const engine = createFingerprintEngine();
    const first = errorRecord({ stackTrace: ORDER_TRACE, message: "Order not found: 42" });
    const second = errorRecord({ stackTrace: ORDER_TRACE, message: "Order not found: 97" });

    expect(engine.fingerprint(first)).toBe(engine.fingerprint(first));
    expect(engine.fingerprint(first)).toBe(engine.fingerprint(second));
  });

  it("falls back to the logging location when the trace has no application frames", () => {
    const engine = createFingerprintEngine();
    const record = errorRecord({
      stackTrace: "java.io.IOException: reset\n\tat java.net.Socket.read(Socket.java:100)",
      className: "com.example.Gateway",
      methodName: "forward",
      lineNumber: 12,
    });

    expect(engine.describeRecord(record)).toMatchObject({
      fingerprint: "com.example.Gateway.forward:12",
      tier: "location",
    });
  });

  it("falls back to the message template when nothing else is known", () => {
    const engine = createFingerprintEngine();

    expect(
      engine.describeRecord(errorRecord({ message: "Failed to process order 123e4567-e89b-12d3-a456-426614174000" })),
    ).toMatchObject({ fingerprint: "Failed to process order <UUID>", tier: "message" });
    expect(engine.fingerprint(errorRecord({ message: "" }))).toBe(EMPTY_MESSAGE_FINGERPRINT);
  });

  it("prefers a structured throwable over the stack trace text", () => {
    const engine = createFingerprintEngine();
    const record = errorRecord({
      stackTrace: ORDER_TRACE,
      throwable: {
        type: "com.example.PaymentException",
        frames: [{ className: "com.example.Payments", methodName: "charge", lineNumber: 40 }],
      },
    });

    expect(engine.fingerprint(record)).toBe("com.example.PaymentException|com.example.Payments.charge:40");
  });

  it("honours custom framework prefixes", () => {
    const engine = createFingerprintEngine({
      classifier: createFrameClassifier(["com.example.orders.OrderService"]),
    });

    expect(engine.fingerprint(errorRecord({ stackTrace: ORDER_TRACE }))).toBe(
      "java.lang.IllegalStateException|com.example.orders.OrderController.submit:31|org.springframework.web.servlet.FrameworkServlet.service:897",
    );
  });
});
