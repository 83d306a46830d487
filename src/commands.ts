export interface CommandConfig {
  template: string;
  description?: string;
}

export interface ConfigWithCommands {
  command?: Record<string, CommandConfig>;
}

const COMMANDS: Record<string, CommandConfig> = {
  'gwt-list': {
    template: 'Call the gwt_list tool and show me its output verbatim.',
    description: 'List git worktrees and the managed base directory',
  },
  'gwt-add': {
    template:
      'Call the gwt_add tool with branch "$ARGUMENTS". Report the worktree path from the last line of its output.',
    description: 'Create a worktree for a branch',
  },
  'gwt-prune': {
    template:
      'Call the gwt_prune tool without confirm, show me the candidates, and only call it again with confirm=true if I agree.',
    description: 'Find and remove worktrees of merged or deleted branches',
  },
};

// Register commands in config hook
export function registerCommands(config: ConfigWithCommands): void {
  if (!config.command) config.command = {};

  for (const [name, command] of Object.entries(COMMANDS)) {
    config.command[name] = { ...command };
  }
}
