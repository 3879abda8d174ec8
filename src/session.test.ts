import { describe, test, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { createCmsClient } from "./index.js";
import type { Logger } from "./logger.js";
import { Session } from "./session.js";
import { startTestServer } from "./testing/server.js";
import type { RecordedRequest, Reply, TestServer } from "./testing/server.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const postTypes = {
  post: { slug: "post", name: "Posts", rest_base: "posts", hierarchical: false },
  book: {
    slug: "book",
    name: "Books",
    rest_base: "books",
    hierarchical: false,
    schema: { properties: { isbn: { type: "string" } } },
  },
};

type LogLine = { level: keyof Logger; message: string };

function recordingLogger(lines: LogLine[]): Logger {
  return {
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
    success: (message) => lines.push({ level: "success", message }),
  };
}

function route(req: RecordedRequest): Reply {
  const { path, method } = req;

  if (path === "/wp-json/wp/v2/types" && method === "GET") {
    return { json: postTypes };
  }
  if (path === "/wp-json/wp/v2/books" && method === "GET") {
    return { json: [] };
  }
  if (path === "/wp-json/wp/v2/books" && method === "POST") {
    const body = req.body;
    if (typeof body === "object" && body !== null && "title" in body && body.title === "Row Two") {
      return { status: 400, statusText: "Bad Request", json: { code: "rest_invalid_param" } };
    }
    return { status: 201, statusText: "Created", json: { id: server.requests.length } };
  }
  if (path === "/wp-json/wp/v2/users/me" && method === "GET") {
    return { json: { id: 1, name: "Editor", roles: ["editor"], capabilities: { publish_posts: true } } };
  }
  return { status: 404, statusText: "Not Found", json: { code: "rest_no_route" } };
}

let server: TestServer;
let dir: string;
let lines: LogLine[];

beforeAll(async () => {
  server = await startTestServer(route);
  dir = await mkdtemp(join(tmpdir(), "session-test-"));
});

afterAll(async () => {
  await server.close();
  await rm(dir, { recursive: true, force: true });
});

beforeEach(() => {
  server.setHandler(route);
  server.requests.length = 0;
  lines = [];
});

function makeSession(): Session {
  return new Session({
    client: createCmsClient({ baseUrl: server.baseUrl, username: "editor", applicationPassword: "test-secret" }),
    logger: recordingLogger(lines),
    mappingFile: join(dir, "mapping.json"),
  });
}

async function writeCsv(name: string, text: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text, "utf8");
  return path;
}

function posts(): RecordedRequest[] {
  return server.requests.filter((req) => req.method === "POST");
}

// ---------------------------------------------------------------------------
// Post types
// ---------------------------------------------------------------------------

describe("post types", () => {
  test("loadPostTypes lists the keys and caches the listing", async () => {
    const session = makeSession();
    await session.loadPostTypes();
    await session.loadPostTypes();
    expect(session.postTypeKeys).toEqual(["post", "book"]);
    expect(server.requests.filter((req) => req.path === "/wp-json/wp/v2/types")).toHaveLength(1);
  });

  test("refreshPostTypes fetches the listing again", async () => {
    const session = makeSession();
    await session.loadPostTypes();
    await session.refreshPostTypes();
    expect(server.requests.filter((req) => req.path === "/wp-json/wp/v2/types")).toHaveLength(2);
  });

  test("a failed listing leaves no post types and logs the error", async () => {
    server.setHandler(() => ({ status: 500, statusText: "Internal Server Error", text: "boom" }));
    const session = makeSession();
    expect(await session.loadPostTypes()).toEqual({});
    expect(session.postTypeKeys).toEqual([]);
    expect(lines).toContainEqual({
      level: "error",
      message: "Error fetching post types: HTTP 500 Internal Server Error: boom",
    });
  });

  test("a malformed listing leaves no post types to select", async () => {
    server.setHandler(() => ({ json: { post: null } }));
    const session = makeSession();
    expect(await session.loadPostTypes()).toEqual({});
    expect(lines).toContainEqual({
      level: "error",
      message: 'Error fetching post types: Invalid JSON response: post type "post": Expected object, received null',
    });
    await expect(session.selectPostType("post")).rejects.toThrow("Unknown post type: post");
  });

  test("selectPostType builds the field list", async () => {
    const session = makeSession();
    await session.loadPostTypes();
    const fields = await session.selectPostType("book");
    expect(fields).toContain("isbn");
    expect(fields).toContain("title");
    expect(session.selectedPostType?.rest_base).toBe("books");
  });

  test("selectPostType rejects an unknown key", async () => {
    const session = makeSession();
    await session.loadPostTypes();
    await expect(session.selectPostType("movie")).rejects.toThrow("Unknown post type: movie");
    await expect(session.selectPostType("constructor")).rejects.toThrow("Unknown post type: constructor");
    expect(session.selectedPostType).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Data sources
// ---------------------------------------------------------------------------

describe("data sources", () => {
  test("a failed CSV load leaves no active dataset", async () => {
    const session = makeSession();
    await session.useCsv(await writeCsv("good.csv", "name\nAda\n"));
    await expect(session.useCsv(join(dir, "absent.csv"))).rejects.toMatchObject({ _tag: "NotFoundError" });
    expect(session.dataset).toBeNull();
  });

  test("useTable requires an open database", () => {
    expect(() => makeSession().useTable("people")).toThrow("Open a database file first");
  });

  test("switching from a CSV to a table keeps only the table rows", async () => {
    const dbFile = join(dir, "people.db");
    const db = new Database(dbFile);
    db.exec("CREATE TABLE people (name TEXT, bio TEXT)");
    db.prepare("INSERT INTO people (name, bio) VALUES (?, ?)").run("Grace", "Admiral");
    db.close();

    const session = makeSession();
    await session.loadPostTypes();
    await session.selectPostType("book");
    await session.useCsv(await writeCsv("two.csv", "name,bio\nAda,Mathematician\nAlan,Logician\n"));

    expect(session.openDatabase(dbFile)).toEqual(["people"]);
    expect(session.dataset?.rows).toHaveLength(2);

    session.useTable("people");
    expect(session.dataset?.source).toEqual({ kind: "table", file: dbFile, table: "people" });
    expect(session.dataset?.rows).toEqual([{ name: "Grace", bio: "Admiral" }]);

    session.setMapping("title", "name");
    const result = await session.upload();
    expect(result).toEqual({ succeeded: 1, failed: 0 });
    expect(posts().map((req) => req.body)).toEqual([{ title: "Grace" }]);
  });
});

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

describe("mapping", () => {
  test("setMapping with null unmaps a field", () => {
    const session = makeSession();
    session.setMapping("title", "name");
    session.setMapping("content", "bio");
    session.setMapping("title", null);
    expect(session.mapping).toEqual({ content: "bio" });
  });

  test("suggestMapping matches column names and keeps manual choices", async () => {
    const session = makeSession();
    await session.loadPostTypes();
    await session.selectPostType("book");
    await session.useCsv(await writeCsv("suggest.csv", "Title,ISBN,Body\nDune,123,Spice\n"));
    session.setMapping("title", "Body");

    expect(session.suggestMapping()).toEqual({ isbn: "ISBN" });
    expect(session.mapping).toEqual({ title: "Body", isbn: "ISBN" });
  });

  test("preview requires a dataset", () => {
    expect(() => makeSession().preview()).toThrow("Load a CSV file or a database table first");
  });

  test("save then load restores the mapping", async () => {
    const session = makeSession();
    session.setMapping("title", "name");
    await session.saveMapping();
    session.clearMapping();
    expect(session.mapping).toEqual({});

    expect(await session.loadMapping()).toBe(true);
    expect(session.mapping).toEqual({ title: "name" });
    expect(lines).toContainEqual({ level: "success", message: `Mapping saved to ${join(dir, "mapping.json")}` });
  });

  test("loading a missing mapping file warns and returns false", async () => {
    const session = makeSession();
    session.setMapping("title", "name");
    const path = join(dir, "nothing-here.json");
    expect(await session.loadMapping(path)).toBe(false);
    expect(session.mapping).toEqual({ title: "name" });
    expect(lines).toContainEqual({ level: "warn", message: `No saved mapping at ${path}` });
  });

  test("loading a mapping with unknown fields warns but keeps them", async () => {
    const path = join(dir, "foreign.json");
    await writeFile(path, JSON.stringify({ title: "name", rating: "stars" }), "utf8");
    const session = makeSession();
    await session.loadPostTypes();
    await session.selectPostType("book");

    expect(await session.loadMapping(path)).toBe(true);
    expect(session.mapping).toEqual({ title: "name", rating: "stars" });
    expect(lines).toContainEqual({
      level: "warn",
      message: "Loaded mapping names fields not offered by this post type: rating",
    });
  });
});

// ---------------------------------------------------------------------------
// Upload
// ---------------------------------------------------------------------------

describe("upload", () => {
  test("creates one item per row and counts the failed row", async () => {
    const session = makeSession();
    await session.loadPostTypes();
    await session.selectPostType("book");
    await session.useCsv(await writeCsv("people.csv", "name,bio\nAda,Mathematician\nRow Two,Unknown\nGrace,Admiral\n"));
    session.setMapping("title", "name");
    session.setMapping("content", "bio");

    const fractions: number[] = [];
    const result = await session.upload((fraction) => fractions.push(fraction));

    expect(result).toEqual({ succeeded: 2, failed: 1 });
    expect(posts().map((req) => req.path)).toEqual([
      "/wp-json/wp/v2/books",
      "/wp-json/wp/v2/books",
      "/wp-json/wp/v2/books",
    ]);
    expect(posts().map((req) => req.body)).toEqual([
      { title: "Ada", content: "Mathematician" },
      { title: "Row Two", content: "Unknown" },
      { title: "Grace", content: "Admiral" },
    ]);
    expect(fractions).toEqual([1 / 3, 2 / 3, 1]);
    expect(lines).toContainEqual({
      level: "error",
      message: 'Row 2 failed: HTTP 400 Bad Request: {"code":"rest_invalid_param"}',
    });
    expect(lines).toContainEqual({ level: "info", message: "Upload finished: 2 succeeded, 1 failed" });
  });

  test("refuses to start without a post type, data or mapping", async () => {
    const session = makeSession();
    await expect(session.upload()).rejects.toThrow("Select a post type first");

    await session.loadPostTypes();
    await session.selectPostType("book");
    await expect(session.upload()).rejects.toThrow("Load a CSV file or a database table first");

    await session.useCsv(await writeCsv("unmapped.csv", "name\nAda\n"));
    await expect(session.upload()).rejects.toThrow("Map at least one field before uploading");
    expect(posts()).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// Connection check
// ---------------------------------------------------------------------------

describe("testConnection", () => {
  test("reports the authenticated user", async () => {
    const report = await makeSession().testConnection();
    expect(report.ok).toBe(true);
    expect(report.user?.name).toBe("Editor");
    expect(server.requests.at(-1)?.params).toEqual({ context: "edit" });
  });

  test("is not ok when the listing is refused", async () => {
    server.setHandler(() => ({ status: 401, statusText: "Unauthorized", json: { code: "rest_not_logged_in" } }));
    expect(await makeSession().testConnection()).toEqual({ ok: false });
    expect(lines).toContainEqual({
      level: "error",
      message: `Cannot reach ${server.baseUrl} with the configured credentials`,
    });
  });

  test("stays ok when only the user lookup fails", async () => {
    server.setHandler((req) =>
      req.path === "/wp-json/wp/v2/users/me" ? { status: 500, statusText: "Internal Server Error", text: "" } : route(req),
    );
    expect(await makeSession().testConnection()).toEqual({ ok: true });
    expect(lines).toContainEqual({
      level: "warn",
      message: "Connected, but the current user lookup failed: HTTP 500 Internal Server Error",
    });
  });
});
