import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpReportSource } from "./httpReportSource";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const source = () =>
  new HttpReportSource({
    urlTemplate: "https://reports.example.test/{period}/{company}.pdf",
    timeoutMs: 500,
  });

describe("HttpReportSource", () => {
  it("fills the url template and returns the PDF bytes", async () => {
    const fetchMock = vi.fn(
      async (..._args: Parameters<typeof fetch>) =>
        new Response("%PDF-1.7 body", {
          status: 200,
          headers: { "content-type": "application/octet-stream" },
        }),
    );
    globalThis.fetch = fetchMock;

    const result = await source().fetchReport({
      companyCode: "1101",
      period: "2024",
    });

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://reports.example.test/2024/1101.pdf",
    );
    expect(result.value.contentType).toBe("application/pdf");
    expect(result.value.sourceUrl).toBe(
      "https://reports.example.test/2024/1101.pdf",
    );
    expect(new TextDecoder().decode(result.value.bytes)).toBe("%PDF-1.7 body");
  });

  it("treats a non-PDF body as a missing report", async () => {
    globalThis.fetch = vi.fn(
      async (..._args: Parameters<typeof fetch>) =>
        new Response("<html>Not here</html>", {
          status: 200,
          headers: { "content-type": "text/html" },
        }),
    );

    const result = await source().fetchReport({
      companyCode: "1101",
      period: "2024",
    });

    if (result.isOk()) {
      throw new Error("expected not_found");
    }
    expect(result.error).toEqual({
      source: "report",
      code: "not_found",
      provider: "http",
      message:
        "Report at https://reports.example.test/2024/1101.pdf is not a PDF (content-type 'text/html').",
      retryable: false,
    });
  });

  it("maps a 404 to not_found", async () => {
    globalThis.fetch = vi.fn(
      async (..._args: Parameters<typeof fetch>) =>
        new Response("missing", { status: 404 }),
    );

    const result = await source().fetchReport({
      companyCode: "1101",
      period: "2024",
    });

    expect(result.isErr() && result.error.code).toBe("not_found");
    expect(result.isErr() && result.error.retryable).toBe(false);
  });
});
