export { tokenize, parse, calcGrammar } from "./src/tokenize";
export { ParseError } from "./src/errors";
export {
    OPERATORS,
    Operator,
    NumberToken,
    OperatorToken,
    Token,
    TokenSequence,
    isOperator,
    operandAt,
    operatorAt,
    formatSequence
} from "./src/tokens";
