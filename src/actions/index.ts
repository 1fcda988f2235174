export {
  commandAction,
  runCommand,
  maskSecrets,
  STDERR_TAIL_CHARS,
  type CommandActionOptions,
} from './command.js';
