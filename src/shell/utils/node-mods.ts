// PURITY: SHELL (module re-exports)
// INVARIANT: Only node:fs and node:path leave this module

import * as fsNS from "node:fs";
import * as pathNS from "node:path";

// node:path and node:fs are declared with `export =`, so `export *` would not carry them
export const fs = fsNS;
export const path = pathNS;
