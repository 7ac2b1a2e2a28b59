export * from './app/model/life';
export * from './app/model/life-errors';
export * from './app/model/random-source';
export * from './app/services/pattern-import.service';
export * from './app/services/life-runtime.service';
