export {
  OPERATOR_WORDS,
  tokenize,
  substituteIdentifiers,
  type Sign,
  type SymbolOperator,
  type Token,
  type SubstitutionResult,
} from './tokenizer.js';
export {
  parseExpression,
  type BinaryOperator,
  type ExpressionNode,
  type IntegerOperator,
  type Operand,
  type StringOperator,
  type UnaryOperator,
} from './parser.js';
export {
  compileFilterExpression,
  globToRegexSource,
  toInteger,
  type CompiledFilter,
  type CompiledPredicate,
} from './compile.js';
