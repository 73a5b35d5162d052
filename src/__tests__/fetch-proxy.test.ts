import { describe, it, expect, vi, afterAll } from "vitest";

// The dispatcher is built when the module loads, so the proxy must be set first
vi.hoisted(() => {
  process.env.HTTPS_PROXY = "http://proxy.test:3128";
});

vi.mock("undici", () => ({
  fetch: vi.fn(),
  ProxyAgent: vi.fn(),
}));

import { fetchPage } from "../lib/scraping/utils";
import { fetch as undiciFetch, ProxyAgent } from "undici";

describe("fetchPage behind a proxy", () => {
  afterAll(() => {
    delete process.env.HTTPS_PROXY;
  });

  it("reuses one ProxyAgent across requests", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue({
      ok: true,
      status: 200,
      text: () => Promise.resolve("<html></html>"),
    });

    await fetchPage("https://example.com/cr1.htm");
    await fetchPage("https://example.com/cr2.htm");

    expect(ProxyAgent).toHaveBeenCalledTimes(1);
    expect(ProxyAgent).toHaveBeenCalledWith("http://proxy.test:3128");
    const calls = (undiciFetch as ReturnType<typeof vi.fn>).mock.calls;
    expect(calls).toHaveLength(2);
    expect(calls[0][1].dispatcher).toBe(calls[1][1].dispatcher);
    expect(calls[0][1].dispatcher).toBeDefined();
  });
});
