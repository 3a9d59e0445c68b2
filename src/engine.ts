import type { EngineOptions, RawPage } from './types';

export abstract class Engine {
  abstract fetch(url: string, options?: EngineOptions): Promise<RawPage>;
  abstract dispose(): Promise<void>;
}
