import { gunzipSync } from "node:zlib";
import { beforeEach, describe, expect, it } from "vitest";
import { RouteError } from "../http/errors.js";
import { HeaderMap } from "../http/headers.js";
import {
  RESPONSE_CREATED,
  RESPONSE_NOT_FOUND,
  RESPONSE_OK,
} from "../http/response-writer.js";
import type { HttpRequest } from "../http/types.js";
import { InMemoryFileSystem } from "../testing/in-memory-filesystem.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { dispatchRequest, resolveFilePath } from "./route-handlers.js";

function request(
  method: string,
  path: string,
  headers: Record<string, string> = {},
  body?: string,
): HttpRequest {
  return {
    line: { method, path, version: "HTTP/1.1" },
    headers: new HeaderMap(headers),
    body: body === undefined ? undefined : fromString(body),
  };
}

async function routeErrorCode(
  pending: Promise<unknown>,
): Promise<string | undefined> {
  try {
    await pending;
  } catch (err) {
    if (err instanceof RouteError) return err.code;
    throw err;
  }
  return undefined;
}

let fs: InMemoryFileSystem;

beforeEach(() => {
  fs = new InMemoryFileSystem();
});

describe("root and echo", () => {
  it("answers / with the shared 200 response", async () => {
    const res = await dispatchRequest(request("GET", "/"), { fs });
    expect(res).toBe(RESPONSE_OK);
  });

  it("echoes the path text as plain text", async () => {
    const res = await dispatchRequest(request("GET", "/echo/banana"), { fs });

    expect(res.status).toBe(200);
    expect([...res.headers]).toEqual([
      ["Content-Type", "text/plain"],
      ["Content-Length", "6"],
    ]);
    expect(decodeToString(res.body)).toBe("banana");
  });

  it("gzips the echo when the client accepts gzip", async () => {
    const res = await dispatchRequest(
      request("GET", "/echo/banana", { "Accept-Encoding": "gzip, deflate" }),
      { fs },
    );

    expect(res.headers.get("Content-Encoding")).toBe("gzip");
    expect(res.headers.get("Content-Length")).toBe(String(res.body.length));
    expect(gunzipSync(res.body).toString("utf8")).toBe("banana");
  });

  it("answers unknown paths with the shared 404 response", async () => {
    const res = await dispatchRequest(request("GET", "/nope"), { fs });
    expect(res).toBe(RESPONSE_NOT_FOUND);
  });
});

describe("user-agent", () => {
  it("reflects the User-Agent header", async () => {
    const res = await dispatchRequest(
      request("GET", "/user-agent", { "User-Agent": "test-agent/1.0" }),
      { fs },
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain");
    expect(res.headers.get("Content-Length")).toBe("14");
    expect(decodeToString(res.body)).toBe("test-agent/1.0");
  });

  it("does not compress the user agent", async () => {
    const res = await dispatchRequest(
      request("GET", "/user-agent", {
        "User-Agent": "test-agent/1.0",
        "Accept-Encoding": "gzip",
      }),
      { fs },
    );
    expect(res.headers.has("Content-Encoding")).toBe(false);
  });

  it("fails when the header is missing", async () => {
    const code = await routeErrorCode(
      dispatchRequest(request("GET", "/user-agent"), { fs }),
    );
    expect(code).toBe("MISSING_USER_AGENT");
  });
});

describe("file GET", () => {
  it("serves file bytes as an octet stream", async () => {
    await fs.mkdir("/srv");
    await fs.writeFile("/srv/a.bin", new Uint8Array([0, 1, 2, 255]));

    const res = await dispatchRequest(request("GET", "/files/a.bin"), {
      directory: "/srv",
      fs,
    });

    expect(res.status).toBe(200);
    expect([...res.headers]).toEqual([
      ["Content-Type", "application/octet-stream"],
      ["Content-Length", "4"],
    ]);
    expect(Array.from(res.body)).toEqual([0, 1, 2, 255]);
  });

  it("gzips file contents when accepted", async () => {
    await fs.mkdir("/srv");
    await fs.writeFile("/srv/notes.txt", fromString("some notes"));

    const res = await dispatchRequest(
      request("GET", "/files/notes.txt", { "Accept-Encoding": "gzip" }),
      { directory: "/srv", fs },
    );

    expect(res.headers.get("Content-Encoding")).toBe("gzip");
    expect(gunzipSync(res.body).toString("utf8")).toBe("some notes");
  });

  it("answers 404 without a serving directory", async () => {
    const res = await dispatchRequest(request("GET", "/files/missing.txt"), {
      fs,
    });
    expect(res).toBe(RESPONSE_NOT_FOUND);
  });

  it("answers 404 for a missing file", async () => {
    await fs.mkdir("/srv");
    const res = await dispatchRequest(request("GET", "/files/missing.txt"), {
      directory: "/srv",
      fs,
    });
    expect(res).toBe(RESPONSE_NOT_FOUND);
  });

  it("refuses dot segments", async () => {
    await fs.writeFile("/secret.txt", fromString("top secret"));
    await fs.mkdir("/srv");

    const res = await dispatchRequest(request("GET", "/files/.."), {
      directory: "/srv",
      fs,
    });
    expect(res).toBe(RESPONSE_NOT_FOUND);
  });

  it("propagates file system errors other than not-found", async () => {
    await fs.mkdir("/srv/sub");
    await expect(
      dispatchRequest(request("GET", "/files/sub"), { directory: "/srv", fs }),
    ).rejects.toThrow("EISDIR");
  });
});

describe("file POST", () => {
  it("creates missing directories and writes the body", async () => {
    const res = await dispatchRequest(
      request("POST", "/files/note.txt", {}, "data"),
      { directory: "/srv/uploads/nested", fs },
    );

    expect(res).toBe(RESPONSE_CREATED);
    expect(fs.hasDirectory("/srv/uploads")).toBe(true);
    expect(
      decodeToString(await fs.readFile("/srv/uploads/nested/note.txt")),
    ).toBe("data");
  });

  it("overwrites an existing file", async () => {
    const context = { directory: "/srv", fs };
    await dispatchRequest(request("POST", "/files/n.txt", {}, "first"), context);
    await dispatchRequest(request("POST", "/files/n.txt", {}, "second"), context);

    expect(decodeToString(await fs.readFile("/srv/n.txt"))).toBe("second");
  });

  it("writes an empty file when there is no body", async () => {
    await dispatchRequest(request("POST", "/files/empty.txt"), {
      directory: "/srv",
      fs,
    });
    expect((await fs.readFile("/srv/empty.txt")).length).toBe(0);
  });

  it("fails without a serving directory", async () => {
    const code = await routeErrorCode(
      dispatchRequest(request("POST", "/files/a.txt", {}, "x"), { fs }),
    );
    expect(code).toBe("DIRECTORY_NOT_CONFIGURED");
    expect(fs.listFiles()).toEqual([]);
  });

  it("refuses dot segments without writing", async () => {
    const res = await dispatchRequest(request("POST", "/files/..", {}, "x"), {
      directory: "/srv",
      fs,
    });
    expect(res).toBe(RESPONSE_NOT_FOUND);
    expect(fs.listFiles()).toEqual([]);
  });
});

describe("resolveFilePath", () => {
  it("joins with exactly one slash", () => {
    expect(resolveFilePath("/srv", "a.txt")).toBe("/srv/a.txt");
    expect(resolveFilePath("/srv//", "a.txt")).toBe("/srv/a.txt");
  });
});
