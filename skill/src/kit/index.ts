export * from './interface.js';
export {
  optional,
  parseChoice,
  parseLiteral,
  parseOptionalPublicKey,
  parseOptionalStringList,
  parsePublicKey,
  parseStringList,
} from './arguments.js';
