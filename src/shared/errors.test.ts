import { describe, expect, it } from "vitest";
import {
	CancelledError,
	CircuitOpenError,
	ConfigError,
	CredentialsError,
	ErrorCategory,
	FatalError,
	NetworkError,
	OrderError,
	RateLimitError,
	TemporaryError,
	TimeoutError,
	TradingError,
	classifyError,
	isCredentialsError,
} from "./errors.js";

function errno(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

function http(message: string, status: number): Error {
	return Object.assign(new Error(message), { status });
}

describe("TradingError", () => {
	it("derives retryability from the category", () => {
		expect(new NetworkError("x").retryable).toBe(true);
		expect(new CredentialsError("x").retryable).toBe(false);
		expect(new FatalError("x").retryable).toBe(false);
	});

	it("treats credentials and fatal as fatal", () => {
		expect(new CredentialsError("x").isFatal).toBe(true);
		expect(new ConfigError("x").isFatal).toBe(true);
		expect(new TemporaryError("x").isFatal).toBe(false);
	});

	it("keeps the cause out of the context", () => {
		const cause = new Error("socket closed");
		const e = new NetworkError("lost", { cause, endpoint: "positions" });
		expect(e.cause).toBe(cause);
		expect(e.context).toEqual({ endpoint: "positions" });
	});

	it("serializes to JSON with hint and retry-after", () => {
		expect(new RateLimitError("slow down", 2000).toJSON()).toEqual({
			name: "RateLimitError",
			message: "slow down",
			code: "RATE_LIMIT_ERROR",
			category: "rate_limit",
			retryable: true,
			context: {},
			retryAfterMs: 2000,
		});
		expect(new CredentialsError("denied").toJSON()["hint"]).toBe("Check the venue API key and secret");
	});

	it("marks breaker rejections and cancellations non-retryable", () => {
		const open = new CircuitOpenError("trading", 5000);
		expect(open.message).toBe("circuit breaker trading is open");
		expect(open.retryable).toBe(false);
		expect(new CancelledError().retryable).toBe(false);
	});

	it("ConfigError is a FatalError with its own code", () => {
		const e = new ConfigError("bad");
		expect(e).toBeInstanceOf(FatalError);
		expect(e.code).toBe("CONFIG_ERROR");
		expect(e.name).toBe("ConfigError");
	});
});

describe("classifyError", () => {
	it("passes TradingErrors through", () => {
		const original = new OrderError("rejected");
		expect(classifyError(original)).toBe(original);
	});

	it("maps HTTP statuses", () => {
		expect(classifyError(http("throttled", 429))).toBeInstanceOf(RateLimitError);
		expect(classifyError(http("nope", 401))).toBeInstanceOf(CredentialsError);
		expect(classifyError(http("nope", 403))).toBeInstanceOf(CredentialsError);
		expect(classifyError(http("bad gateway", 502))).toBeInstanceOf(TemporaryError);
	});

	it("reads the status from the cause", () => {
		const wrapped = new Error("request failed", { cause: http("inner", 429) });
		expect(classifyError(wrapped).category).toBe(ErrorCategory.RateLimit);
	});

	it("maps errno codes", () => {
		expect(classifyError(errno("x", "ETIMEDOUT"))).toBeInstanceOf(TimeoutError);
		expect(classifyError(errno("x", "ECONNRESET"))).toBeInstanceOf(NetworkError);
	});

	it.each([
		["context deadline exceeded", ErrorCategory.Timeout],
		["request timed out", ErrorCategory.Timeout],
		["dial tcp: lookup failed", ErrorCategory.Network],
		["connection refused", ErrorCategory.Network],
		["invalid api key", ErrorCategory.Credentials],
		["Unauthorized", ErrorCategory.Credentials],
		["Too Many Requests", ErrorCategory.RateLimit],
		["insufficient margin", ErrorCategory.Order],
		["qty below minimum", ErrorCategory.Order],
		["something odd happened", ErrorCategory.Temporary],
	])("classifies %j as %s", (message, category) => {
		expect(classifyError(new Error(message)).category).toBe(category);
	});

	it("marks balance and parameter order errors non-retryable", () => {
		const balance = classifyError(new Error("insufficient balance"));
		expect(balance.code).toBe("INSUFFICIENT_BALANCE");
		expect(balance.retryable).toBe(false);
		expect(classifyError(new Error("invalid quantity")).code).toBe("INVALID_PARAMETERS");
	});

	it("recognizes orders the venue no longer knows", () => {
		const gone = classifyError(new Error("order not exists or too late to cancel"));
		expect(gone.code).toBe("ORDER_NOT_FOUND");
		expect(gone.retryable).toBe(false);
	});

	it("treats non-Error values as fatal unknowns", () => {
		const e = classifyError("kaboom");
		expect(e).toBeInstanceOf(FatalError);
		expect(e.code).toBe("UNKNOWN_ERROR");
		expect(e.message).toBe("kaboom");
	});
});

describe("isCredentialsError", () => {
	it("narrows credential failures only", () => {
		expect(isCredentialsError(new CredentialsError("x"))).toBe(true);
		expect(isCredentialsError(new TradingError("x", "X", ErrorCategory.Order))).toBe(false);
		expect(isCredentialsError(new Error("x"))).toBe(false);
	});
});
