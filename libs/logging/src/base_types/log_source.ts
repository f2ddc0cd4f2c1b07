/**
 * Components that write log lines.
 */
export enum LogSource {
  CardProductionCli = 'card-production-cli',
  ParameterStore = 'parameter-store',
  GidsProcedure = 'gids-procedure',
  SmartPgpProcedure = 'smartpgp-procedure',
}
