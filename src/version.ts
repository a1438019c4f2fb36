import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  // src/ when run from sources, dist/src/ once built
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

export const VERSION = process.env.KUBE_INVENTORY_VERSION || readVersionFromPackageJson() || "0.0.0";
