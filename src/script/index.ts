/**
 * Script module - parsing, binding, conditions, and variables
 */

// Types
export type {
  BindError,
  BindErrorKind,
  BindResult,
  CommandLine,
  ConditionOperator,
  Instruction,
  InstructionType,
  SpriteType,
  Unknown,
} from './types.js';

// Loader
export {
  loadReusableScript,
  loadSceneScript,
  type ScriptProvider,
  type ScriptSource,
} from './loader.js';

// Parser and binding
export { bindCommand, commandNames, isKnownCommand } from './catalogue.js';
export { bindLine, parseCommandLine, splitScript } from './parser.js';

// Conditions
export {
  ConditionBlock,
  ConditionFormatError,
  evaluate,
  shouldEvaluateLine,
  type Condition,
} from './conditions.js';

// Variables
export {
  ARGUMENT_SIGIL,
  VARIABLE_SIGIL,
  VariableTable,
  resolveVariables,
  validateVariableName,
} from './variables.js';
