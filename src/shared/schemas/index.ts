export * from './wireSchemas';
export * from './settingsSchemas';
