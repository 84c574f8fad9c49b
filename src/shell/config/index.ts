export { parseCLIArgs, USAGE } from "./cli.js";
export { loadAnalyzerConfig } from "./loader.js";
