export interface CommandLine {
    steps: boolean;
    tree: boolean;
    help: boolean;
    expression: string;
}

// Only exact flags are taken out; "-3" and the like stay part of the expression.
export function parseCommandLine(args: string[]): CommandLine {
    const flags = { steps: false, tree: false, help: false };
    const words: string[] = [];

    for (const arg of args) {
        if (arg === "--steps") flags.steps = true;
        else if (arg === "--tree") flags.tree = true;
        else if (arg === "--help" || arg === "-h") flags.help = true;
        else words.push(arg);
    }

    return { ...flags, expression: words.join(" ") };
}
