import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { parseBoolean, parseHostList } from "@/lib/config/settings";
import { effectiveAllowedHosts, isHostAllowed } from "@/lib/http/allowed-hosts";
import { validationError } from "@/lib/api/response-helpers";

export const config = {
  runtime: "nodejs",
};

export function middleware(request: NextRequest) {
  const allowed = effectiveAllowedHosts(
    parseHostList(process.env.ALLOWED_HOSTS),
    parseBoolean(process.env.DEBUG)
  );
  const host = request.headers.get("host") ?? request.nextUrl.host;

  if (!isHostAllowed(host, allowed)) {
    console.error(`Rejected request for disallowed host: ${host}`);
    return validationError(`Invalid HTTP_HOST header: ${host}`);
  }

  return NextResponse.next();
}
