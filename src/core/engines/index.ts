/**
 * Engine exports
 */
export type { ISequencingEngine, ActivityUpdate } from '../ISequencingEngine';
export { JavaScriptEngine } from './JavaScriptEngine';
