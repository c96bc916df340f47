#!/usr/bin/env node
import { loadConfig } from "./config";
import { parseCommandLine } from "./args";
import { evaluateLine } from "./evaluate";
import { runRepl } from "./repl";

function printUsage() {
    console.log(`Usage:
  calc [--steps] [--tree] <expression...>
  calc [--steps] [--tree]              read expressions from standard input

  --steps   print the sequence after every reduction
  --tree    print the expression with its grouping made explicit
`);
}

async function main() {
    const commandLine = parseCommandLine(process.argv.slice(2));
    if (commandLine.help) {
        printUsage();
        return;
    }

    const config = loadConfig();
    const options = { ...config, steps: commandLine.steps, tree: commandLine.tree };

    if (commandLine.expression.trim() !== "") {
        for (const line of evaluateLine(commandLine.expression, options)) {
            console.log(line);
        }
        return;
    }

    // piped input gets no prompt and no line editing, even when stdout is a terminal
    const terminal = process.stdin.isTTY === true;
    const prompt = terminal ? config.prompt : "";
    await runRepl(process.stdin, process.stdout, { ...options, prompt, terminal });
}

main().catch(err => {
    console.error("Error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
