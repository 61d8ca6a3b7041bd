export {
  parseEmbeddedExpression,
  unwrapExpression,
  type ExpressionParseResult
} from './parse';
export { referencedBindings } from './references';
