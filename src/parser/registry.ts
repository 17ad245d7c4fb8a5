import type { SourceParserPlugin } from './plugin.js';
import type { ParsedEntity } from '../model/entity.js';
import { getExtension } from '../utils/path.js';

export class ParserRegistry {
  private plugins = new Map<string, SourceParserPlugin>();
  private extensionMap = new Map<string, string>(); // ext → plugin id

  register(plugin: SourceParserPlugin): void {
    this.plugins.set(plugin.id, plugin);
    for (const ext of plugin.extensions) {
      this.extensionMap.set(ext, plugin.id);
    }
  }

  getPlugin(filePath: string): SourceParserPlugin | undefined {
    const pluginId = this.extensionMap.get(getExtension(filePath));
    return pluginId ? this.plugins.get(pluginId) : undefined;
  }

  supports(filePath: string): boolean {
    return this.extensionMap.has(getExtension(filePath));
  }

  /** Files no plugin handles have no entities. */
  parseFile(content: string, filePath: string): ParsedEntity[] {
    return this.getPlugin(filePath)?.extractEntities(content, filePath) ?? [];
  }
}
