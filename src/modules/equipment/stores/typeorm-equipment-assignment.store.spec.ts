import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { EquipmentAssignment } from '../../../entities';
import { TypeOrmEquipmentAssignmentStore } from './typeorm-equipment-assignment.store';

function assignment(compositeEntityId: string, memberEntityId: string): EquipmentAssignment {
  const row = new EquipmentAssignment();
  row.compositeEntityId = compositeEntityId;
  row.memberEntityId = memberEntityId;
  row.createdAt = new Date('2025-01-01T00:00:00Z');
  return row;
}

describe('TypeOrmEquipmentAssignmentStore', () => {
  const insertBuilder = {
    insert: jest.fn(),
    into: jest.fn(),
    values: jest.fn(),
    orIgnore: jest.fn(),
    execute: jest.fn(),
  };
  const repo = {
    createQueryBuilder: jest.fn(),
    delete: jest.fn(),
    find: jest.fn(),
  };
  let store: TypeOrmEquipmentAssignmentStore;

  beforeEach(async () => {
    jest.resetAllMocks();
    repo.createQueryBuilder.mockReturnValue(insertBuilder);
    insertBuilder.insert.mockReturnValue(insertBuilder);
    insertBuilder.into.mockReturnValue(insertBuilder);
    insertBuilder.values.mockReturnValue(insertBuilder);
    insertBuilder.orIgnore.mockReturnValue(insertBuilder);
    insertBuilder.execute.mockResolvedValue({ identifiers: [], generatedMaps: [], raw: [] });

    const moduleRef = await Test.createTestingModule({
      providers: [
        TypeOrmEquipmentAssignmentStore,
        { provide: getRepositoryToken(EquipmentAssignment), useValue: repo },
      ],
    }).compile();
    store = moduleRef.get(TypeOrmEquipmentAssignmentStore);
  });

  it('inserts an assignment, ignoring an existing pair', async () => {
    await store.assign('29747', 'RMG07');

    expect(insertBuilder.into).toHaveBeenCalledWith(EquipmentAssignment);
    expect(insertBuilder.values).toHaveBeenCalledWith({
      compositeEntityId: '29747',
      memberEntityId: 'RMG07',
    });
    expect(insertBuilder.orIgnore).toHaveBeenCalled();
    expect(insertBuilder.execute).toHaveBeenCalledTimes(1);
  });

  it('returns member ids in query order', async () => {
    repo.find.mockResolvedValue([assignment('29747', 'RMG03'), assignment('29747', 'RMG07')]);

    await expect(store.getMembers('29747')).resolves.toEqual(['RMG03', 'RMG07']);
    expect(repo.find).toHaveBeenCalledWith({
      where: { compositeEntityId: '29747' },
      order: { memberEntityId: 'ASC' },
    });
  });

  it('lists pairs without bookkeeping columns', async () => {
    repo.find.mockResolvedValue([assignment('29747', 'RMG03')]);

    await expect(store.listAssignments()).resolves.toEqual([
      { compositeEntityId: '29747', memberEntityId: 'RMG03' },
    ]);
  });

  it('reports whether an unassign removed a pair', async () => {
    repo.delete.mockResolvedValue({ affected: 0, raw: [] });

    await expect(store.unassign('29747', 'RMG99')).resolves.toBe(false);
  });
});
