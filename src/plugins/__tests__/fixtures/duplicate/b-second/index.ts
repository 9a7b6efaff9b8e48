import { Plugin } from '../../../../plugin.js';
import type { PluginConfiguration } from '../../../../plugin.js';

export default class DupPlugin extends Plugin {
  protected configure(): PluginConfiguration {
    return { name: 'fixture::dup' };
  }
}
