// src/cli/usage-formatter.ts

export interface CommandSummary {
  name: string;
  description: string;
}

export interface CommandGroup {
  /** '' for the root namespace */
  namespace: string;
  commands: CommandSummary[];
}

export class UsageFormatter {
  static formatUsageLine(prog: string): string {
    return `usage: ${prog} <command> [<args>]`;
  }

  /**
   * Program usage: the usage line, a blank line, root commands, then each
   * namespace label with its commands indented under it. Descriptions line
   * up in one column.
   */
  static formatUsage(prog: string, groups: CommandGroup[]): string {
    const lines: string[] = [this.formatUsageLine(prog), ''];
    const width = this.nameColumnWidth(groups);

    for (const group of groups) {
      if (!group.namespace) {
        for (const command of group.commands) {
          lines.push(`  ${command.name.padEnd(width)}  ${command.description}`);
        }
        continue;
      }

      lines.push(`  ${group.namespace}`);
      for (const command of group.commands) {
        lines.push(`    ${command.name.padEnd(width - 2)}  ${command.description}`);
      }
    }

    return lines.join('\n') + '\n';
  }

  private static nameColumnWidth(groups: CommandGroup[]): number {
    let width = 0;
    for (const group of groups) {
      const indent = group.namespace ? 2 : 0;
      for (const command of group.commands) {
        width = Math.max(width, command.name.length + indent);
      }
    }
    return width;
  }
}
