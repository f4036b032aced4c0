/*
Where Data is Stored:

We centralize here determination of all directories on the file system
where the estimator reads rate files and writes logs.

All information here must be determinable when this module is initialized,
e.g., from environment variables or heuristics involving the file system.

Environment Variables:
- root -- if COSTCALC_ROOT is set then it; otherwise the repository root, i.e., two directories above this package.
- data -- if the environment variable COSTCALC_DATA is set, use that.  Otherwise, use {root}/data.
          This is where the rate files (unit-prices.json, infra-rates.json, ...) are.
- logs -- if env var LOGS is set, use that; otherwise, {data}/logs:  directory in which to store logs
*/

import { join, resolve } from "path";
// pkg-dir 5 is the last release that is not ESM only
import { sync as packageDirectorySync } from "pkg-dir";

function determineRoot(): string {
  const pd = packageDirectorySync(__dirname) ?? "/";
  const root = resolve(pd, "..", "..", "..");
  process.env.COSTCALC_ROOT = root;
  return root;
}

export const root: string = process.env.COSTCALC_ROOT ?? determineRoot();
export const data: string = process.env.COSTCALC_DATA ?? join(root, "data");
export const logs: string = process.env.LOGS ?? join(data, "logs");
