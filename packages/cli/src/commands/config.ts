import type { Command } from 'commander';
import { ENV_VARS, PREF_KEYS, type ConfigService } from '@crosstalk/core';

export interface ConfigCommandDeps {
  createConfigService: () => ConfigService;
  configDir: () => string;
}

/** Accepts `codex-model` as well as `codexModel`. */
export function toPrefKeyName(key: string): string {
  return key.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function registerConfigCommand(program: Command, deps: ConfigCommandDeps): void {
  const { configDir } = deps;
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show')
    .description('Show the resolved configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const resolved = await deps.createConfigService().resolve();
      const display = { ...resolved, configDir: configDir() };

      if (opts.json) {
        console.log(JSON.stringify(display, null, 2));
        return;
      }
      console.log(`\n  Configuration:`);
      console.log(`  Codex CLI:      ${display.codex.command}`);
      console.log(`  Codex Model:    ${display.codex.model}`);
      console.log(`  Gemini CLI:     ${display.gemini.command}`);
      console.log(`  Gemini Model:   ${display.gemini.model}`);
      console.log(`  Project:        ${display.projectPath ?? '(working directory)'}`);
      console.log(
        `  Timeouts:       ask ${display.timeouts.ask}s, consensus ${display.timeouts.consensus}s, ` +
          `debate ${display.timeouts.debate}s, council ${display.timeouts.council}s`,
      );
      console.log(`  Config Dir:     ${display.configDir}`);
      console.log(`\n  Environment overrides: ${Object.values(ENV_VARS).join(', ')}`);
      console.log();
    });

  config
    .command('set')
    .description('Save a preference')
    .argument('<key>', `Preference key (${PREF_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string) => {
      try {
        const prefKey = toPrefKeyName(key);
        await deps.createConfigService().setPreference(prefKey, value);
        console.log(`${prefKey} set to: ${value.trim()}`);
      } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });

  config
    .command('reset')
    .description('Reset preferences to defaults')
    .action(async () => {
      await deps.createConfigService().reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the config directory')
    .action(() => {
      console.log(configDir());
    });

  // Default: show config when no subcommand
  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
