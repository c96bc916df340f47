export { evaluate, evaluateLine, EvaluateOptions } from "./src/evaluate";
export { formatResult } from "./src/format";
export { CalcConfig, ConfigError, defaultConfig, loadConfig } from "./src/config";
export { runRepl, ReplOptions } from "./src/repl";
export { parseCommandLine, CommandLine } from "./src/args";
