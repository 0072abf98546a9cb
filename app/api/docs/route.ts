import { json, notFoundError, internalError } from "@/lib/api/response-helpers";
import * as fs from "fs";
import * as path from "path";

const OPENAPI_PATH = path.join(process.cwd(), "docs", "openapi.json");

/**
 * GET /api/docs
 * Returns the OpenAPI description from docs/openapi.json.
 */
export async function GET() {
  try {
    if (!fs.existsSync(OPENAPI_PATH)) {
      return notFoundError("API description not found");
    }
    const raw = fs.readFileSync(OPENAPI_PATH, "utf-8");
    const document: unknown = JSON.parse(raw);
    return json(document);
  } catch (err) {
    console.error("GET /api/docs error:", err);
    return internalError(err);
  }
}
