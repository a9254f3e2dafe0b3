export * from './core/index.js';
export { type LogLevel, setLogLevel } from './obs/logger.js';
export { type LoadResult, loadConfig } from './store/config.js';
export type { NestArgsConfig, TreeDef, TypeDef } from './store/schema.js';
export {
	buildParser,
	loadTreeFile,
	parseTreeDef,
	toTypeSpec,
} from './store/tree-file.js';
