import type { Plugin } from '@opencode-ai/plugin';
import { createHooks } from './plugin';

export const WorktreeManager: Plugin = async () => {
  return createHooks();
};

export default WorktreeManager;
