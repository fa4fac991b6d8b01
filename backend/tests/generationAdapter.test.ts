import { describe, it, expect, vi } from "vitest";
import { GenerationAdapter } from "../src/services/generation/adapter";
import type { GenerationBackend } from "../src/services/generation/types";
import { normalizeParameters, parseRequestParameters } from "../src/services/suggestions/params";
import { DependencyTimeoutError, DependencyUnavailableError, GenerationFailureError } from "../src/errors";

const params = normalizeParameters(parseRequestParameters({ destination: "Paris", days: 3 }));
const options = { failureThreshold: 2, cooldownMs: 1000, timeoutMs: 30, concurrency: 1 };

function backend(generate: GenerationBackend["generate"]): GenerationBackend {
  return { name: "fake", generate: vi.fn(generate) };
}

describe("GenerationAdapter", () => {
  it("should return trimmed non-empty lines", async () => {
    const adapter = new GenerationAdapter(backend(async () => [" 3 x Socks ", "", "1 x Passport"]), options);
    await expect(adapter.generate(params)).resolves.toEqual(["3 x Socks", "1 x Passport"]);
    expect(adapter.capability().state).toBe("available");
  });

  it("should reject an empty payload as a generation failure", async () => {
    const adapter = new GenerationAdapter(backend(async () => []), options);
    await expect(adapter.generate(params)).rejects.toBeInstanceOf(GenerationFailureError);
  });

  it("should time out a hanging backend", async () => {
    const adapter = new GenerationAdapter(backend(() => new Promise<string[]>(() => undefined)), options);
    await expect(adapter.generate(params)).rejects.toBeInstanceOf(DependencyTimeoutError);
  });

  it("should become unavailable after repeated failures", async () => {
    const fake = backend(async () => {
      throw new Error("upstream 500");
    });
    const adapter = new GenerationAdapter(fake, options);
    await expect(adapter.generate(params)).rejects.toThrow("upstream 500");
    await expect(adapter.generate(params)).rejects.toThrow("upstream 500");

    expect(adapter.capability().state).toBe("unavailable");
    await expect(adapter.generate(params)).rejects.toBeInstanceOf(DependencyUnavailableError);
    expect(fake.generate).toHaveBeenCalledTimes(2);
  });

  it("should run calls one at a time under a concurrency of one", async () => {
    let active = 0;
    let peak = 0;
    const adapter = new GenerationAdapter(
      backend(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return ["1 x Hat"];
      }),
      { ...options, timeoutMs: 500 }
    );

    await Promise.all([adapter.generate(params), adapter.generate(params), adapter.generate(params)]);
    expect(peak).toBe(1);
  });

  it("should be unavailable without a backend", async () => {
    const adapter = new GenerationAdapter(null, options);
    expect(adapter.capability().state).toBe("unavailable");
    expect(adapter.backendName).toBe("none");
    await expect(adapter.generate(params)).rejects.toBeInstanceOf(DependencyUnavailableError);
  });
});
