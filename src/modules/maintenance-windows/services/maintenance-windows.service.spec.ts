import { BadRequestException, ConflictException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { LessThanOrEqual, MoreThanOrEqual, QueryFailedError } from 'typeorm';
import { EntityType, MaintenanceWindow } from '../../../entities';
import { MaintenanceWindowsService } from './maintenance-windows.service';

describe('MaintenanceWindowsService', () => {
  const repo = {
    findOne: jest.fn(),
    find: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
    delete: jest.fn(),
  };
  let service: MaintenanceWindowsService;

  const input = {
    entityId: 'RMG05',
    entityType: EntityType.CRANE,
    fromDatetime: new Date('2025-09-01T07:00:00Z'),
    toDatetime: new Date('2025-09-01T12:00:00Z'),
    serviceType: 'A',
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        MaintenanceWindowsService,
        { provide: getRepositoryToken(MaintenanceWindow), useValue: repo },
      ],
    }).compile();
    service = moduleRef.get(MaintenanceWindowsService);
  });

  it('saves a new window', async () => {
    repo.findOne.mockResolvedValue(null);
    repo.create.mockImplementation((row: Partial<MaintenanceWindow>) => row);
    repo.save.mockImplementation(async (row: Partial<MaintenanceWindow>) => ({ id: 3, ...row }));

    const window = await service.addWindow(input);

    expect(window.id).toBe(3);
    expect(repo.create).toHaveBeenCalledWith({
      ...input,
      taskDescription: null,
      notes: null,
    });
  });

  it('rejects a window that ends before it starts', async () => {
    await expect(
      service.addWindow({ ...input, toDatetime: input.fromDatetime }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(repo.save).not.toHaveBeenCalled();
  });

  it('rejects a window that is already planned', async () => {
    repo.findOne.mockResolvedValue({ id: 1 });

    await expect(service.addWindow(input)).rejects.toBeInstanceOf(ConflictException);
  });

  it('reports a concurrent duplicate insert as a conflict', async () => {
    repo.findOne.mockResolvedValue(null);
    repo.create.mockImplementation((row: Partial<MaintenanceWindow>) => row);
    repo.save.mockRejectedValue(
      new QueryFailedError(
        'INSERT INTO "maintenance_windows"',
        [],
        Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' }),
      ),
    );

    await expect(service.addWindow(input)).rejects.toBeInstanceOf(ConflictException);
  });

  it('passes other save failures through', async () => {
    repo.findOne.mockResolvedValue(null);
    repo.create.mockImplementation((row: Partial<MaintenanceWindow>) => row);
    const failure = new QueryFailedError(
      'INSERT INTO "maintenance_windows"',
      [],
      Object.assign(new Error('value too long'), { code: '22001' }),
    );
    repo.save.mockRejectedValue(failure);

    await expect(service.addWindow(input)).rejects.toBe(failure);
  });

  it('filters by entity and overlapping range', async () => {
    repo.find.mockResolvedValue([]);
    const from = new Date('2025-09-01T00:00:00Z');
    const to = new Date('2025-09-30T00:00:00Z');

    await service.listWindows({ entityId: 'RMG05', from, to });

    expect(repo.find).toHaveBeenCalledWith({
      where: {
        entityId: 'RMG05',
        toDatetime: MoreThanOrEqual(from),
        fromDatetime: LessThanOrEqual(to),
      },
      order: { fromDatetime: 'ASC', id: 'ASC' },
    });
  });

  it('returns false when nothing was deleted', async () => {
    repo.delete.mockResolvedValue({ affected: 0, raw: [] });

    await expect(service.deleteWindow(42)).resolves.toBe(false);
  });
});
