import { createInterface } from "readline";
import { CalcConfig } from "./config";
import { EvaluateOptions, evaluateLine } from "./evaluate";

export interface ReplOptions extends EvaluateOptions {
    prompt: CalcConfig["prompt"];
    // true only when the input is an interactive terminal
    terminal: boolean;
}

export function runRepl(input: NodeJS.ReadableStream, output: NodeJS.WritableStream, options: ReplOptions): Promise<void> {
    const rl = createInterface({ input, output, prompt: options.prompt, terminal: options.terminal });

    return new Promise((resolve, reject) => {
        rl.on("line", line => {
            if (line.trim() !== "") {
                try {
                    for (const text of evaluateLine(line, options)) {
                        output.write(`${text}\n`);
                    }
                } catch (e) {
                    rl.close();
                    reject(e);
                    return;
                }
            }
            rl.prompt();
        });

        // Ctrl-C ends the session the same way Ctrl-D does
        rl.on("SIGINT", () => rl.close());
        rl.on("close", () => resolve());

        rl.prompt();
    });
}
