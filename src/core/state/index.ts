export { MetadataStore, writeSourceSnapshot } from './metadata.js';
