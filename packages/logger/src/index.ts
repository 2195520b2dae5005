export {
  defaultLoggerOptions,
  defaultPinoHttpOptions,
  developmentTarget,
  productionTarget,
  redactedPaths,
} from './options';
