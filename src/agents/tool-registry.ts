/**
 * Tool Registry - Lookup and discovery over every analytics tool.
 *
 * Each area exports plain tool definitions; the registry indexes them by
 * category and by name-derived tags so callers can list what is available
 * or search for a tool by keyword.
 */

export interface ToolMetadata {
  /** Area that owns the tool (stock, classification, purchasing, ...). */
  category: string;
  tags: string[];
}

/** Minimal shape required by the registry -- compatible with any tool definition */
export interface RegistryTool {
  name: string;
  description: string;
  input_schema: unknown;
}

export interface RegisteredTool<T extends RegistryTool = RegistryTool> {
  tool: T;
  metadata: ToolMetadata;
}

export class ToolRegistry<T extends RegistryTool = RegistryTool> {
  private tools: Map<string, RegisteredTool<T>> = new Map();
  private byCategory: Map<string, Set<string>> = new Map();
  private tagIndex: Map<string, Set<string>> = new Map();

  register(tool: T, category: string): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    const metadata = inferToolMetadata(tool.name, category);
    this.tools.set(tool.name, { tool, metadata });

    let set = this.byCategory.get(metadata.category);
    if (!set) {
      set = new Set();
      this.byCategory.set(metadata.category, set);
    }
    set.add(tool.name);

    for (const tag of metadata.tags) {
      let tagged = this.tagIndex.get(tag);
      if (!tagged) {
        tagged = new Set();
        this.tagIndex.set(tag, tagged);
      }
      tagged.add(tool.name);
    }
  }

  registerAll(tools: readonly T[], category: string): void {
    for (const tool of tools) {
      this.register(tool, category);
    }
  }

  get(name: string): T | undefined {
    return this.tools.get(name)?.tool;
  }

  metadata(name: string): ToolMetadata | undefined {
    return this.tools.get(name)?.metadata;
  }

  size(): number {
    return this.tools.size;
  }

  list(): T[] {
    return Array.from(this.tools.values(), (entry) => entry.tool);
  }

  searchByCategory(category: string): T[] {
    const names = this.byCategory.get(category.toLowerCase());
    if (!names) return [];
    return this.resolve(names);
  }

  /**
   * Keyword search: a tag hit scores 3, a name hit 2, a description hit 1.
   * Highest score first, registration order on ties.
   */
  searchByText(query: string): T[] {
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    const scored = new Map<string, number>();

    for (const term of terms) {
      const tagHits = this.tagIndex.get(term);
      if (tagHits) {
        for (const name of tagHits) {
          scored.set(name, (scored.get(name) ?? 0) + 3);
        }
      }
    }

    for (const [name, { tool }] of this.tools) {
      let score = scored.get(name) ?? 0;
      const descLower = tool.description.toLowerCase();
      for (const term of terms) {
        if (name.includes(term)) score += 2;
        if (descLower.includes(term)) score += 1;
      }
      if (score > 0) scored.set(name, score);
    }

    const order = Array.from(this.tools.keys());
    const ranked = Array.from(scored.entries()).sort(
      (a, b) => b[1] - a[1] || order.indexOf(a[0]) - order.indexOf(b[0]),
    );
    return this.resolve(ranked.map(([name]) => name));
  }

  getAvailableCategories(): string[] {
    return Array.from(this.byCategory.keys());
  }

  private resolve(names: Iterable<string>): T[] {
    const result: T[] = [];
    for (const name of names) {
      const entry = this.tools.get(name);
      if (entry) result.push(entry.tool);
    }
    return result;
  }
}

/** Tags are the name's words longer than two characters. */
export function inferToolMetadata(toolName: string, category: string): ToolMetadata {
  const tags = toolName
    .toLowerCase()
    .split('_')
    .filter((part) => part.length > 2);
  return { category: category.toLowerCase(), tags };
}
