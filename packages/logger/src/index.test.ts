import { createCaptureStream as captureStream } from "@paramspace/common/testing";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createNodeLogger, resolveLoggerOptions, withComponent } from "./node";

describe("Logger Package", () => {
	describe("Node Logger", () => {
		it("should write structured JSON with severity and base context", () => {
			const { lines, stream } = captureStream();
			const logger = createNodeLogger(
				{ service: "test-service", environment: "test", base: { component: "test-comp" } },
				stream,
			);

			logger.info({ parameter: "x1" }, "hello");

			expect(lines).toHaveLength(1);
			expect(lines[0]).toMatchObject({
				severity: "INFO",
				service: "test-service",
				environment: "test",
				component: "test-comp",
				parameter: "x1",
				msg: "hello",
			});
			expect(lines[0]).not.toHaveProperty("pid");
			expect(lines[0]).not.toHaveProperty("hostname");
		});

		it("should map warn to WARNING", () => {
			const { lines, stream } = captureStream();
			const logger = createNodeLogger({ service: "test", environment: "test" }, stream);

			logger.warn("careful");

			expect(lines[0]?.severity).toBe("WARNING");
		});

		it("should default to info level", () => {
			const logger = createNodeLogger({ service: "test", environment: "test" });
			expect(logger.level).toBe("info");
		});

		it("should drop messages below the configured level", () => {
			const { lines, stream } = captureStream();
			const logger = createNodeLogger({ service: "test", environment: "test", level: "warn" }, stream);

			logger.info("ignored");
			logger.error("kept");

			expect(lines).toHaveLength(1);
			expect(lines[0]?.msg).toBe("kept");
		});

		it("should include version when provided", () => {
			const { lines, stream } = captureStream();
			const logger = createNodeLogger({ service: "test", environment: "test", version: "1.2.3" }, stream);

			logger.info("v");

			expect(lines[0]?.version).toBe("1.2.3");
		});

		it("should censor redacted paths", () => {
			const { lines, stream } = captureStream();
			const logger = createNodeLogger(
				{ service: "test", environment: "test", redactPaths: ["secret"] },
				stream,
			);

			logger.info({ secret: "test-secret" }, "redacted");

			expect(lines[0]?.secret).toBe("[REDACTED]");
		});

		it("should write ISO timestamps", () => {
			const { lines, stream } = captureStream();
			const logger = createNodeLogger({ service: "test", environment: "test" }, stream);

			logger.info("time");

			expect(typeof lines[0]?.time).toBe("string");
			expect(String(lines[0]?.time)).toMatch(/^\d{4}-\d{2}-\d{2}T/);
		});
	});

	describe("withComponent", () => {
		it("should tag child logs with the component", () => {
			const { lines, stream } = captureStream();
			const logger = withComponent(createNodeLogger({ service: "test", environment: "test" }, stream), "SearchSpace");

			logger.debug("hidden");
			logger.info("shown");

			expect(lines).toHaveLength(1);
			expect(lines[0]?.component).toBe("SearchSpace");
		});
	});

	describe("resolveLoggerOptions", () => {
		let originalEnv: NodeJS.ProcessEnv;

		beforeEach(() => {
			originalEnv = { ...process.env };
		});

		afterEach(() => {
			process.env = originalEnv;
		});

		it("should read level and pretty flag from the environment", () => {
			process.env.PARAMSPACE_LOG_LEVEL = "debug";
			process.env.PARAMSPACE_LOG_PRETTY = "true";

			const resolved = resolveLoggerOptions({ service: "test", environment: "test" });

			expect(resolved.level).toBe("debug");
			expect(resolved.pretty).toBe(true);
		});

		it("should prefer explicit options", () => {
			process.env.PARAMSPACE_LOG_LEVEL = "debug";

			const resolved = resolveLoggerOptions({ service: "test", environment: "test", level: "error", pretty: false });

			expect(resolved.level).toBe("error");
			expect(resolved.pretty).toBe(false);
		});

		it("should fall back to info and no pretty printing outside development", () => {
			delete process.env.PARAMSPACE_LOG_LEVEL;
			delete process.env.PARAMSPACE_LOG_PRETTY;

			const resolved = resolveLoggerOptions({ service: "test", environment: "production" });

			expect(resolved.level).toBe("info");
			expect(resolved.pretty).toBe(false);
		});
	});
});
