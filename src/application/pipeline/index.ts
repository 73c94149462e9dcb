export * from './request';
export * from './pipeline-behavior';
export * from './request-pipeline';
export * from './behaviors';
