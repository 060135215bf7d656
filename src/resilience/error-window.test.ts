import { describe, expect, it } from "vitest";
import { CredentialsError, NetworkError, OrderError } from "../shared/errors.js";
import { ErrorWindow } from "./error-window.js";

describe("ErrorWindow", () => {
	it("keeps only the most recent entries", () => {
		const window = new ErrorWindow(3);
		window.record(new CredentialsError("a"), "gateway", "positions", 1);
		window.record(new NetworkError("b"), "gateway", "positions", 2);
		window.record(new NetworkError("c"), "gateway", "positions", 3);
		window.record(new NetworkError("d"), "gateway", "positions", 4);

		expect(window.length).toBe(3);
		expect(window.count("credentials")).toBe(0);
		expect(window.count("network")).toBe(3);
		expect(window.snapshot().recent.map((r) => r.atMs)).toEqual([2, 3, 4]);
	});

	it("keeps lifetime totals beyond the window", () => {
		const window = new ErrorWindow(2);
		for (let i = 0; i < 5; i++) window.record(new OrderError("x"), "tp", "place", i);

		const snapshot = window.snapshot();
		expect(snapshot.lifetimeTotal).toBe(5);
		expect(snapshot.lifetimeByCategory.order).toBe(5);
		expect(snapshot.lifetimeByCategory.network).toBe(0);
	});

	it("computes category rates over the window", () => {
		const window = new ErrorWindow();
		expect(window.credentialRate()).toBe(0);
		window.record(new CredentialsError("a"), "c", "o", 0);
		window.record(new OrderError("b"), "c", "o", 0);
		window.record(new OrderError("c"), "c", "o", 0);
		window.record(new NetworkError("d"), "c", "o", 0);

		expect(window.credentialRate()).toBe(0.25);
		expect(window.orderRate()).toBe(0.5);
	});

	it("clear empties the window but not the totals", () => {
		const window = new ErrorWindow();
		window.record(new NetworkError("a"), "c", "o", 0);
		window.clear();
		expect(window.length).toBe(0);
		expect(window.snapshot().lifetimeTotal).toBe(1);
	});
});
