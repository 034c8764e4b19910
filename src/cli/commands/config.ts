/**
 * Config Commands
 *
 * show: print the config file (secrets masked) and the resolved settings
 * set:  write one key to ~/.config/cardscan/config.json
 */

import type { Command } from 'commander';

import { c } from '../colors.js';

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('View or change saved settings');

  configCmd
    .command('show', { isDefault: true })
    .description('Show saved and resolved settings')
    .action(async () => {
      const { loadConfig, loadConfigFile, describeConfig, getConfigPath } = await import('../../core/config.js');

      const file = await loadConfigFile();
      const resolved = await loadConfig();

      console.log(`\n${c.title('Config file')} ${c.path(getConfigPath())}`);
      const rows = describeConfig(file);
      if (rows.length === 0) {
        console.log(c.dim('  (empty)'));
      }
      for (const [key, value] of rows) {
        console.log(`  ${key.padEnd(18)} ${value}`);
      }

      console.log(`\n${c.title('Resolved')}`);
      console.log(`  provider           ${resolved.provider}`);
      console.log(`  model              ${resolved.model}`);
      console.log(`  max_tokens         ${resolved.maxTokens}`);
      console.log(`  phone_region       ${resolved.phoneRegion}`);
      console.log(`  data_dir           ${resolved.dataDir}\n`);
    });

  configCmd
    .command('set')
    .description('Save a setting')
    .argument('<key>', 'Setting name, e.g. openai_api_key or provider')
    .argument('<value>', 'Setting value')
    .action(async (key: string, value: string) => {
      const { isConfigKey, parseConfigEntry, saveConfig, CONFIG_KEYS, getConfigPath } = await import('../../core/config.js');
      const { ConfigError } = await import('../../core/errors.js');

      if (!isConfigKey(key)) {
        console.error(`Unknown setting "${key}". Valid settings: ${CONFIG_KEYS.join(', ')}`);
        process.exit(1);
      }

      try {
        await saveConfig(parseConfigEntry(key, value));
        console.log(c.success(`✓ Saved ${key} to ${getConfigPath()}`));
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(error.message);
          process.exit(1);
        }
        throw error;
      }
    });
}
