export * from './base_types/log_event_types';
export * from './base_types/log_source';
export * from './log_event_ids';
export * from './logger';
export * from './types';
