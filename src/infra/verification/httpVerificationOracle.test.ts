import { afterEach, describe, expect, it, vi } from "vitest";
import {
  extractPageTitle,
  HttpVerificationOracle,
} from "./httpVerificationOracle";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const config = {
  perplexityBaseUrl: "https://pplx.example.test",
  perplexityApiKey: "test-secret",
  perplexityModel: "sonar",
  timeoutMs: 500,
};

const urlOf = (input: Parameters<typeof fetch>[0]): string =>
  typeof input === "string"
    ? input
    : input instanceof URL
      ? input.toString()
      : input.url;

describe("extractPageTitle", () => {
  it("collapses whitespace inside the title element", () => {
    expect(
      extractPageTitle("<html><title>\n  River   report \n</title></html>"),
    ).toBe("River report");
  });

  it("returns undefined without a title", () => {
    expect(extractPageTitle("<html></html>")).toBeUndefined();
  });
});

describe("HttpVerificationOracle", () => {
  it("treats 403 as live and 404 as dead", async () => {
    globalThis.fetch = vi.fn(async (...args: Parameters<typeof fetch>) =>
      urlOf(args[0]).endsWith("/blocked")
        ? new Response("<title>Blocked page</title>", { status: 403 })
        : new Response("gone", { status: 404 }),
    );

    const oracle = new HttpVerificationOracle(config);

    const blocked = await oracle.verify({
      kind: "liveness",
      url: "https://news.example.test/blocked",
    });
    const missing = await oracle.verify({
      kind: "liveness",
      url: "https://news.example.test/missing",
    });

    expect(blocked._unsafeUnwrap()).toEqual({
      liveness: "live",
      pageTitle: "Blocked page",
    });
    expect(missing._unsafeUnwrap()).toEqual({ liveness: "dead" });
  });

  it("skips excluded domains and returns the first live candidate", async () => {
    globalThis.fetch = vi.fn(async (...args: Parameters<typeof fetch>) => {
      const url = urlOf(args[0]);
      if (url.endsWith("/chat/completions")) {
        return new Response(
          JSON.stringify({
            choices: [
              {
                message: {
                  content:
                    '```json\n{"urls": ["https://www.acme.example/esg", "https://press.example.test/story"]}\n```',
                },
              },
            ],
          }),
          { status: 200 },
        );
      }

      return new Response("<title>Press story</title>", { status: 200 });
    });

    const oracle = new HttpVerificationOracle(config);
    const result = await oracle.verify({
      kind: "repair",
      claimText: "Water recycling rate reached 90%",
      companyName: "Acme",
      period: "2024",
      excludeDomains: ["acme.example"],
    });

    expect(result._unsafeUnwrap()).toEqual({
      liveness: "dead",
      replacementUrl: "https://press.example.test/story",
      pageTitle: "Press story",
    });
  });

  it("passes over a candidate on the company's own site found by name", async () => {
    const fetched: string[] = [];
    globalThis.fetch = vi.fn(async (...args: Parameters<typeof fetch>) => {
      const url = urlOf(args[0]);
      fetched.push(url);
      if (url.endsWith("/chat/completions")) {
        return new Response(
          JSON.stringify({
            choices: [
              {
                message: {
                  content:
                    '{"urls": ["https://www.acme-cement.example.test/esg", "https://press.example.test/water"]}',
                },
              },
            ],
          }),
          { status: 200 },
        );
      }

      return new Response("<title>Water audit</title>", { status: 200 });
    });

    const oracle = new HttpVerificationOracle(config);
    const result = await oracle.verify({
      kind: "repair",
      claimText: "All plants recycle process water.",
      companyName: "Acme Cement Corp",
      period: "2024",
      excludeDomains: [],
    });

    expect(result._unsafeUnwrap()).toEqual({
      liveness: "dead",
      replacementUrl: "https://press.example.test/water",
      pageTitle: "Water audit",
    });
    expect(fetched).toEqual([
      "https://pplx.example.test/chat/completions",
      "https://press.example.test/water",
    ]);
  });
});
