import { BatchOrchestrator } from '../download/core/BatchOrchestrator';
import { BatchState } from '../download/core/BatchState';
import { CookiesManager } from '../utils/CookiesManager';
import { FileManager } from '../utils/FileManager';
import { AppConfig } from './config';

export interface AppContext {
  config: AppConfig;
  cookiesManager: CookiesManager;
  fileManager: FileManager;
  orchestrator: BatchOrchestrator;
  state: BatchState;
}
