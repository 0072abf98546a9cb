import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { GET as serveMedia } from "@/app/media/[...path]/route";
import { apiRequest, routeParams } from "@/__tests__/lib/api-helpers";

const mediaRoot = process.env.MEDIA_ROOT ?? "";

function get(segments: string[]) {
  return serveMedia(apiRequest(`/media/${segments.join("/")}`), routeParams({ path: segments }));
}

describe("GET /media/[...path]", () => {
  it("serves stored files with their content type", async () => {
    const dir = path.join(mediaRoot, "users", "avatars");
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "served.webp"), Buffer.from([1, 2, 3]));

    const res = await get(["users", "avatars", "served.webp"]);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("image/webp");
    expect(res.headers.get("content-length")).toBe("3");
    expect(Buffer.from(await res.arrayBuffer())).toEqual(Buffer.from([1, 2, 3]));
  });

  it("returns 404 for missing files", async () => {
    const res = await get(["recipes", "images", "missing.png"]);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: "File not found" });
  });

  it("refuses paths outside the media root", async () => {
    expect((await get(["..", "etc", "passwd"])).status).toBe(404);
  });
});
