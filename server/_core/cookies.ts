import type { CookieOptions, Request } from "express";

export type CookieRequest = Pick<Request, "protocol" | "headers">;

function isSecureRequest(req: CookieRequest): boolean {
  if (req.protocol === "https") return true;

  // Proxies may send a comma-separated chain.
  const forwardedProto = req.headers["x-forwarded-proto"];
  const protoList = Array.isArray(forwardedProto) ? forwardedProto : (forwardedProto ?? "").split(",");
  return protoList.some((proto) => proto.trim().toLowerCase() === "https");
}

export function getSessionCookieOptions(
  req: CookieRequest
): Pick<CookieOptions, "domain" | "httpOnly" | "path" | "sameSite" | "secure"> {
  return {
    httpOnly: true,
    path: "/",
    sameSite: "lax",
    secure: isSecureRequest(req),
  };
}
