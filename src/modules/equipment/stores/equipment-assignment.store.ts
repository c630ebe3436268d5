export interface AssignmentPair {
  compositeEntityId: string;
  memberEntityId: string;
}

/**
 * Which cranes a composite entity (spreader) has accrued usage on.
 * Membership is static: a member's whole recorded history counts.
 */
export abstract class EquipmentAssignmentStore {
  /**
   * Idempotent
   */
  abstract assign(compositeEntityId: string, memberEntityId: string): Promise<void>;

  abstract unassign(compositeEntityId: string, memberEntityId: string): Promise<boolean>;

  /**
   * Member ids, sorted
   */
  abstract getMembers(compositeEntityId: string): Promise<string[]>;

  abstract listAssignments(): Promise<AssignmentPair[]>;
}
