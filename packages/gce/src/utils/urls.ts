/**
 * Compute Engine resource URLs.
 *
 * Canonical form:
 *   https://www.googleapis.com/compute/v1/projects/<project>/zones/<zone>/<type>/<name>
 * with `zones/<zone>` replaced by `regions/<region>` or `global` as appropriate.
 * Relative forms starting at `projects/` are accepted when parsing.
 */

import { ReconcileError, ReconcileErrorType } from "@tidewater/core";

export const COMPUTE_API_PREFIX = "https://www.googleapis.com/compute/v1/";

const KNOWN_PREFIXES = [
  COMPUTE_API_PREFIX,
  "https://www.googleapis.com/compute/beta/",
  "https://compute.googleapis.com/compute/v1/",
  "https://compute.googleapis.com/compute/beta/",
];

export class GoogleCloudURL {
  constructor(
    readonly project: string,
    readonly type: string,
    readonly name: string,
    readonly location: { zone: string } | { region: string } | "global"
  ) {}

  get global(): boolean {
    return this.location === "global";
  }

  get zone(): string | undefined {
    return typeof this.location === "object" && "zone" in this.location ? this.location.zone : undefined;
  }

  get region(): string | undefined {
    return typeof this.location === "object" && "region" in this.location ? this.location.region : undefined;
  }

  toString(): string {
    let scope: string;
    if (this.location === "global") {
      scope = "global";
    } else if ("zone" in this.location) {
      scope = `zones/${this.location.zone}`;
    } else {
      scope = `regions/${this.location.region}`;
    }
    return `${COMPUTE_API_PREFIX}projects/${this.project}/${scope}/${this.type}/${this.name}`;
  }
}

export function parseGoogleCloudURL(url: string): GoogleCloudURL {
  const malformed = (reason: string) =>
    new ReconcileError(
      `invalid google cloud URL (${reason}): "${url}"`,
      ReconcileErrorType.MALFORMED_IDENTIFIER
    );

  const prefix = KNOWN_PREFIXES.find((p) => url.startsWith(p));
  const path = prefix ? url.slice(prefix.length) : url;
  const tokens = path.split("/");

  if (tokens.length < 4 || tokens[0] !== "projects" || !tokens[1]) {
    throw malformed("expected projects/<project>");
  }
  const project = tokens[1];
  let rest = tokens.slice(2);

  let location: GoogleCloudURL["location"];
  if (rest[0] === "global") {
    location = "global";
    rest = rest.slice(1);
  } else if (rest[0] === "zones" && rest[1]) {
    location = { zone: rest[1] };
    rest = rest.slice(2);
  } else if (rest[0] === "regions" && rest[1]) {
    location = { region: rest[1] };
    rest = rest.slice(2);
  } else {
    throw malformed("expected global, zones/<zone> or regions/<region>");
  }

  const [type, name] = rest;
  if (rest.length !== 2 || !type || !name) {
    throw malformed("expected <type>/<name>");
  }

  return new GoogleCloudURL(project, type, name, location);
}

export function lastComponent(s: string): string {
  const i = s.lastIndexOf("/");
  return i === -1 ? s : s.slice(i + 1);
}

export function buildMachineTypeURL(project: string, zone: string, name: string): string {
  return new GoogleCloudURL(project, "machineTypes", name, { zone }).toString();
}

/**
 * Expand an image spec into its canonical URL. The spec is either a bare
 * image name in the default project, or `project/name`.
 */
export function buildImageURL(defaultProject: string, nameSpec: string): string {
  const tokens = nameSpec.split("/");
  let project: string;
  let name: string;

  if (tokens.length === 1 && tokens[0]) {
    project = defaultProject;
    name = tokens[0];
  } else if (tokens.length === 2 && tokens[0] && tokens[1]) {
    project = tokens[0];
    name = tokens[1];
  } else {
    throw new ReconcileError(
      `cannot parse image spec: "${nameSpec}"`,
      ReconcileErrorType.MALFORMED_IDENTIFIER
    );
  }

  return new GoogleCloudURL(project, "images", name, "global").toString();
}

/**
 * Inverse of {@link buildImageURL}: the bare name when the image lives in the
 * default project, `project/name` otherwise.
 */
export function shortenImageURL(defaultProject: string, imageURL: string): string {
  const u = parseGoogleCloudURL(imageURL);
  return u.project === defaultProject ? u.name : `${u.project}/${u.name}`;
}
