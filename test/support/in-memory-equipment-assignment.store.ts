import {
  AssignmentPair,
  EquipmentAssignmentStore,
} from '../../src/modules/equipment/stores/equipment-assignment.store';

export class InMemoryEquipmentAssignmentStore extends EquipmentAssignmentStore {
  private readonly members = new Map<string, Set<string>>();

  async assign(compositeEntityId: string, memberEntityId: string): Promise<void> {
    const set = this.members.get(compositeEntityId) ?? new Set<string>();
    set.add(memberEntityId);
    this.members.set(compositeEntityId, set);
  }

  async unassign(compositeEntityId: string, memberEntityId: string): Promise<boolean> {
    return this.members.get(compositeEntityId)?.delete(memberEntityId) ?? false;
  }

  async getMembers(compositeEntityId: string): Promise<string[]> {
    return [...(this.members.get(compositeEntityId) ?? [])].sort();
  }

  async listAssignments(): Promise<AssignmentPair[]> {
    const pairs: AssignmentPair[] = [];
    for (const compositeEntityId of [...this.members.keys()].sort()) {
      for (const memberEntityId of await this.getMembers(compositeEntityId)) {
        pairs.push({ compositeEntityId, memberEntityId });
      }
    }
    return pairs;
  }
}
