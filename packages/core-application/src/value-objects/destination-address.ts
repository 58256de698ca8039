import path from "node:path";
import { InvalidDestinationError } from "../application/errors";

export type LocalDestination = {
  kind: "local";
  root: string;
};

export type ShareDestination = {
  kind: "share";
  host: string;
  port?: number;
  share: string;
  /** "/"-separated, no leading or trailing slash; "" for the share root */
  pathOnShare: string;
};

export type DestinationAddress = LocalDestination | ShareDestination;

const SHARE_SCHEME = "smb://";

export function isShareAddress(raw: string): boolean {
  return raw.trim().toLowerCase().startsWith(SHARE_SCHEME);
}

/**
 * smb://host[:port]/share[/path/...] is a share address; anything else is
 * a local path.
 */
export function parseDestination(raw: string): DestinationAddress {
  if (!isShareAddress(raw)) {
    return { kind: "local", root: path.resolve(raw) };
  }

  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new InvalidDestinationError(`Malformed share address: ${raw}`, raw);
  }

  if (!url.hostname) {
    throw new InvalidDestinationError(`Share address without host: ${raw}`, raw);
  }

  const segments = url.pathname
    .split("/")
    .filter((s) => s.length > 0)
    .map((s) => decodeURIComponent(s));

  const [share, ...rest] = segments;
  if (!share) {
    throw new InvalidDestinationError(`Invalid share address: ${raw}. Expected smb://host/share/path`, raw);
  }

  return {
    kind: "share",
    host: url.hostname,
    port: url.port ? Number(url.port) : undefined,
    share,
    pathOnShare: rest.join("/"),
  };
}

export function joinSharePath(...parts: string[]): string {
  return parts
    .flatMap((p) => p.split("/"))
    .filter((s) => s.length > 0)
    .join("/");
}

export function formatShareLocation(dest: ShareDestination, pathOnShare: string): string {
  const host = dest.port ? `${dest.host}:${dest.port}` : dest.host;
  const tail = joinSharePath(dest.share, pathOnShare);
  return `smb://${host}/${tail}`;
}
