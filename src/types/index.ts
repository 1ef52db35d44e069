export * from './karakeep.js';
export * from './matrix.js';
export * from './media.js';
export * from './state.js';
export * from './report.js';
export * from './pipeline.js';
export * from './youtube.js';
