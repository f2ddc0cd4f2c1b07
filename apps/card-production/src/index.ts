export * from './config/procedure_config';
export * from './errors';
export * from './operator';
export * from './parameter_store';
export * from './params/gids_parameters';
export * from './params/gp_parameters';
export * from './params/openpgp_parameters';
export * from './params/random';
export * from './params/record_type';
export * from './params/validation';
export * from './procedures/card_manager';
export * from './procedures/generate_parameters';
export * from './procedures/produce_gids';
export * from './procedures/produce_smartpgp';
export * from './procedures/reconcile';
export * from './toolkit';
export * from './tools/global_platform';
export * from './tools/gids_tool';
export * from './tools/native_tool';
export * from './tools/openpgp_tool';
export * from './tools/opensc_explorer';
export * from './tools/pkcs15_init';
export * from './tools/pkcs15_tool';
export * from './tools/shell';
export * from './tools/types';
