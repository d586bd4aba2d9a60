import { AppConfig } from './config/env';
import { PersistenceContext } from './db/gateway';
import { AiProvider } from './utils/openaiService';

/** Everything a request handler needs, built once at startup. */
export interface AppContext {
  readonly config: AppConfig;
  readonly persistence: PersistenceContext;
  readonly ai: AiProvider;
}
