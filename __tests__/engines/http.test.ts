import { describe, it, expect, vi, afterEach } from "vitest";
import { HttpEngine } from "../../src/engines";
import { NetworkError } from "../../src/errors";
import { ReviewScraper } from "../../src/scraper";
import { COSTCO_PAGE, COSTCO_URL } from "../helpers";

const PAGE_URL = "https://www.costco.com/desk.product.1.html";

function failingBody(error: Error): ReadableStream<Uint8Array> {
  return new ReadableStream({
    pull(controller) {
      controller.error(error);
    },
  });
}

function stubFetch(impl: () => Promise<Response>) {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function fetchError(engine: HttpEngine): Promise<NetworkError> {
  try {
    await engine.fetch(PAGE_URL);
  } catch (error) {
    if (error instanceof NetworkError) return error;
    throw error;
  }
  throw new Error("expected fetch to fail");
}

describe("HttpEngine", () => {
  const engine = new HttpEngine({ userAgent: "test-agent", timeout: 50 });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the page body", async () => {
    const fetchMock = stubFetch(async () => new Response("<html>ok</html>", { status: 200 }));

    await expect(engine.fetch(PAGE_URL)).resolves.toEqual({ url: PAGE_URL, status: 200, html: "<html>ok</html>" });

    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(headers).toMatchObject({ "User-Agent": "test-agent" });
  });

  it("merges extra headers", async () => {
    const fetchMock = stubFetch(async () => new Response("", { status: 200 }));

    await engine.fetch(PAGE_URL, { headers: { Cookie: "session=test" } });

    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ "User-Agent": "test-agent", Cookie: "session=test" });
  });

  it("marks client errors as not retryable", async () => {
    stubFetch(async () => new Response("", { status: 404, statusText: "Not Found" }));

    const error = await fetchError(engine);
    expect(error.message).toBe("HTTP error 404: Not Found");
    expect(error.status).toBe(404);
    expect(error.retryable).toBe(false);
  });

  it("marks server errors and rate limits as retryable", async () => {
    stubFetch(async () => new Response("", { status: 503, statusText: "Service Unavailable" }));
    expect((await fetchError(engine)).retryable).toBe(true);

    stubFetch(async () => new Response("", { status: 429 }));
    const limited = await fetchError(engine);
    expect(limited.message).toBe("Rate limited by www.costco.com");
    expect(limited.retryable).toBe(true);
  });

  it("reports timeouts", async () => {
    stubFetch(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });

    const error = await fetchError(engine);
    expect(error.message).toBe(`Request to ${PAGE_URL} timed out after 50ms`);
    expect(error.retryable).toBe(true);
    expect(error.code).toBe("NETWORK_ERROR");
  });

  it("wraps connection failures", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await fetchError(engine);
    expect(error.message).toBe(`Request to ${PAGE_URL} failed: fetch failed`);
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it("wraps a body that fails mid-read", async () => {
    stubFetch(async () => new Response(failingBody(new TypeError("terminated")), { status: 200 }));

    const error = await fetchError(engine);
    expect(error.message).toBe(`Request to ${PAGE_URL} failed: terminated`);
    expect(error.retryable).toBe(true);
  });

  it("reports a timeout while reading the body", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    stubFetch(async () => new Response(failingBody(timeout), { status: 200 }));

    const error = await fetchError(engine);
    expect(error.message).toBe(`Request to ${PAGE_URL} timed out after 50ms`);
    expect(error.retryable).toBe(true);
  });

  it("lets the scraper retry a broken body", async () => {
    const fetchMock = vi
      .fn<(input: string, init?: RequestInit) => Promise<Response>>()
      .mockResolvedValueOnce(new Response(failingBody(new TypeError("terminated")), { status: 200 }))
      .mockResolvedValueOnce(new Response(COSTCO_PAGE, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const scraper = new ReviewScraper({ engine, retry: { attempts: 2, delay: 1 } });

    const result = await scraper.scrape(COSTCO_URL);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(result.reviews).toHaveLength(4);
  });

  it("releases the body of an error response", async () => {
    const cancel = vi.fn();
    stubFetch(async () => new Response(new ReadableStream({ cancel }), { status: 503, statusText: "Service Unavailable" }));

    const error = await fetchError(engine);
    expect(error.status).toBe(503);
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});
