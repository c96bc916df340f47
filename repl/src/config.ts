export interface CalcConfig {
    prompt: string;
    // fractional digits kept before trailing zeros are trimmed
    precision: number;
    parseErrorMessage: string;
}

export const defaultConfig: CalcConfig = {
    prompt: "calc> ",
    precision: 10,
    parseErrorMessage: "Unable to parse expression",
};

export class ConfigError extends Error {
    constructor(message: string, public readonly variable: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function readPrecision(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === "") {
        return defaultConfig.precision;
    }

    const precision = Number(raw);
    // Number.prototype.toFixed accepts 0..100
    if (!Number.isInteger(precision) || precision < 0 || precision > 100) {
        throw new ConfigError(`CALC_PRECISION must be an integer between 0 and 100, got '${raw}'`, "CALC_PRECISION");
    }
    return precision;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalcConfig {
    return {
        // an empty CALC_PROMPT is kept: it turns the prompt off
        prompt: env.CALC_PROMPT ?? defaultConfig.prompt,
        precision: readPrecision(env.CALC_PRECISION),
        parseErrorMessage: env.CALC_PARSE_ERROR_MESSAGE || defaultConfig.parseErrorMessage,
    };
}
