export { HMDBSource, type HMDBSourceOptions } from './hmdb.js';
export { KEGGSource, type KEGGSourceOptions, type KEGGFetchResult } from './kegg.js';
