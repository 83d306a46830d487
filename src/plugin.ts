import type { Plugin } from '@opencode-ai/plugin';
import { registerCommands } from './commands';
import { gwt_add } from './tools/add';
import { gwt_list } from './tools/list';
import { gwt_move } from './tools/move';
import { gwt_pr_checkout } from './tools/pr-checkout';
import { gwt_prune } from './tools/prune';
import { gwt_remove } from './tools/remove';

export type PluginHooks = Awaited<ReturnType<Plugin>>;

export function createHooks(): PluginHooks {
  return {
    config: async (config) => {
      registerCommands(config);
    },
    tool: {
      gwt_add,
      gwt_remove,
      gwt_move,
      gwt_list,
      gwt_pr_checkout,
      gwt_prune,
    },
  };
}
