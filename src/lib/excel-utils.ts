export * from './excel-types';
export * from './excel-errors';
export * from './excel-helpers';
export * from './excel-cell-map-table';
export * from './excel-cell-map';
export * from './excel-input-validator';
export * from './excel-workbook-io';
export * from './excel-consolidation-schema';
export * from './excel-estimate-schema';
export * from './excel-consolidation-writer';
export * from './excel-consolidation-progress';
export * from './excel-consolidator';
export * from './consolidator-logger';
export * from './consolidator-settings';
