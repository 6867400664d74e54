import { describe, expect, it } from "vitest";
import { clampPageSize, listDocuments, ListConfig, ListTermination } from "../../src/crawl/lister";
import { createSilentLogger, MetricsRegistry } from "../../src/observability";
import { ListedIdentifier } from "../../src/types";
import { FakeTransport, listPage, ok, status } from "../helpers/fakeTransport";

const LIST_PATH = "/akn/fi/act/statute/list";

function uris(page: number, count: number): string[] {
  return Array.from({ length: count }, (_, index) => `/akn/fi/act/statute/2024/${page * 100 + index}/fin@`);
}

function pagedTransport(pages: Array<string[] | "error" | "malformed">): FakeTransport {
  return new FakeTransport().on(LIST_PATH, (request) => {
    const page = Number(request.query?.page ?? 1);
    const entry = pages[page - 1];
    if (entry === undefined) {
      return ok("[]");
    }
    if (entry === "error") {
      return status(500);
    }
    if (entry === "malformed") {
      return ok("<html>oops</html>");
    }
    return listPage(entry);
  });
}

async function drain(
  transport: FakeTransport,
  config: Partial<ListConfig> = {},
): Promise<{ items: ListedIdentifier[]; termination: ListTermination }> {
  const generator = listDocuments(
    { category: "act", documentType: "statute", ...config },
    { transport, logger: createSilentLogger() },
  );
  const items: ListedIdentifier[] = [];
  for (;;) {
    const next = await generator.next();
    if (next.done) {
      return { items, termination: next.value };
    }
    items.push(next.value);
  }
}

describe("listDocuments", () => {
  it("stops after a short page without requesting another", async () => {
    const transport = pagedTransport([uris(1, 10), uris(2, 10), uris(3, 3)]);

    const { items, termination } = await drain(transport, { limit: 10 });

    expect(items).toHaveLength(23);
    expect(transport.requestsFor(LIST_PATH)).toHaveLength(3);
    expect(termination).toBe("short-page");
  });

  it("sends the listing query parameters", async () => {
    const transport = pagedTransport([uris(1, 2)]);

    await drain(transport, { langAndVersion: "swe@", startYear: 2020, endYear: 2024, limit: 5 });

    expect(transport.requests[0]).toEqual({
      path: LIST_PATH,
      accept: "application/json",
      query: { format: "json", page: 1, limit: 5, langAndVersion: "swe@", startYear: 2020, endYear: 2024 },
    });
  });

  it("yields uri, change status and page in listing order", async () => {
    const transport = new FakeTransport().on(
      LIST_PATH,
      ok(
        JSON.stringify([
          { akn_uri: "/akn/fi/act/statute/2024/1/fin@", status: "NEW" },
          { akn_uri: "/akn/fi/act/statute/2024/2/fin@", status: "MODIFIED" },
          { akn_uri: "/akn/fi/act/statute/2024/3/fin@", status: "REMOVED" },
        ]),
      ),
    );

    const { items } = await drain(transport);

    expect(items).toEqual([
      { uri: "/akn/fi/act/statute/2024/1/fin@", changeStatus: "NEW", page: 1 },
      { uri: "/akn/fi/act/statute/2024/2/fin@", changeStatus: "MODIFIED", page: 1 },
      { uri: "/akn/fi/act/statute/2024/3/fin@", changeStatus: "unknown", page: 1 },
    ]);
  });

  it("ends on an empty page", async () => {
    const transport = pagedTransport([uris(1, 10)]);

    const { items, termination } = await drain(transport);

    expect(items).toHaveLength(10);
    expect(transport.requestsFor(LIST_PATH)).toHaveLength(2);
    expect(termination).toBe("end-of-data");
  });

  it("keeps items already yielded when a later page fails", async () => {
    const transport = pagedTransport([uris(1, 10), "error"]);

    const { items, termination } = await drain(transport);

    expect(items).toHaveLength(10);
    expect(termination).toBe("request-failed");
  });

  it("treats a transport exception as a failed request", async () => {
    const transport = new FakeTransport().on(LIST_PATH, new Error("connection reset"));

    const { items, termination } = await drain(transport);

    expect(items).toEqual([]);
    expect(termination).toBe("request-failed");
  });

  it("reports a malformed body separately from end of data", async () => {
    const transport = pagedTransport([uris(1, 10), "malformed"]);

    const { items, termination } = await drain(transport);

    expect(items).toHaveLength(10);
    expect(termination).toBe("malformed-body");
  });

  it("treats a JSON object body as malformed", async () => {
    const transport = new FakeTransport().on(LIST_PATH, ok(JSON.stringify({ items: [] })));

    const { termination } = await drain(transport);

    expect(termination).toBe("malformed-body");
  });

  it("honours maxPages", async () => {
    const transport = pagedTransport([uris(1, 10), uris(2, 10), uris(3, 10)]);

    const { items, termination } = await drain(transport, { maxPages: 2 });

    expect(items).toHaveLength(20);
    expect(transport.requestsFor(LIST_PATH)).toHaveLength(2);
    expect(termination).toBe("page-limit-reached");
  });

  it("starts from the given page", async () => {
    const transport = pagedTransport([uris(1, 10), uris(2, 10), uris(3, 4)]);

    const { items } = await drain(transport, { startPage: 3 });

    expect(items.map((item) => item.page)).toEqual([3, 3, 3, 3]);
    expect(transport.requests.map((request) => request.query?.page)).toEqual([3]);
  });

  it("clamps the page size to ten", async () => {
    const transport = pagedTransport([uris(1, 10), uris(2, 2)]);

    const { items } = await drain(transport, { limit: 50 });

    expect(transport.requests[0].query?.limit).toBe(10);
    expect(items).toHaveLength(12);
  });

  it("skips entries without a uri", async () => {
    const transport = new FakeTransport().on(
      LIST_PATH,
      ok(JSON.stringify([{ status: "NEW" }, { akn_uri: "/akn/fi/act/statute/2024/9/fin@", status: "NEW" }])),
    );

    const { items } = await drain(transport);

    expect(items.map((item) => item.uri)).toEqual(["/akn/fi/act/statute/2024/9/fin@"]);
  });

  it("fetches pages lazily", async () => {
    const transport = pagedTransport([uris(1, 10), uris(2, 10), uris(3, 10)]);
    const metrics = new MetricsRegistry();
    const generator = listDocuments(
      { category: "act", documentType: "statute" },
      { transport, logger: createSilentLogger(), metrics },
    );

    await generator.next();
    expect(transport.requests).toHaveLength(1);

    let pulled = 1;
    for await (const _item of generator) {
      pulled += 1;
      if (pulled === 10) {
        break;
      }
    }

    expect(transport.requests).toHaveLength(1);
    expect(metrics.getCounter("pages_listed")).toBe(1);
  });
});

describe("clampPageSize", () => {
  it.each([
    [undefined, 10],
    [0, 1],
    [3, 3],
    [10, 10],
    [25, 10],
  ])("clamps %s to %s", (input, expected) => {
    expect(clampPageSize(input)).toBe(expected);
  });
});
