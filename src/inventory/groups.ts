/**
 * Ordered group membership, keyed by group name
 */
export class GroupMap {
  private readonly groups = new Map<string, string[]>();

  /**
   * Append a member to a group, creating the group if it does not exist yet.
   * Order of insertion is kept and duplicates are not collapsed.
   */
  append(group: string, member: string): void {
    const members = this.groups.get(group);
    if (members) {
      members.push(member);
    } else {
      this.groups.set(group, [member]);
    }
  }

  get size(): number {
    return this.groups.size;
  }

  entries(): IterableIterator<[string, string[]]> {
    return this.groups.entries();
  }
}
