import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Adds service duration tracking and planned maintenance windows.
 */
export class ServiceDurationAndWindows1761000000000 implements MigrationInterface {
  name = 'ServiceDurationAndWindows1761000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      ALTER TABLE "service_log"
      ADD COLUMN IF NOT EXISTS "durationHours" double precision
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "maintenance_windows" (
        "id" SERIAL NOT NULL,
        "entityId" varchar(64) NOT NULL,
        "entityType" "public"."entity_type_enum" NOT NULL,
        "fromDatetime" TIMESTAMP WITH TIME ZONE NOT NULL,
        "toDatetime" TIMESTAMP WITH TIME ZONE NOT NULL,
        "serviceType" varchar(64),
        "taskDescription" text,
        "notes" text,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_maintenance_windows" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_maintenance_windows_range" CHECK ("toDatetime" > "fromDatetime")
      )
    `);

    // One window per entity and time slot; the importer relies on this for duplicate detection
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS "idx_maintenance_windows_natural"
      ON "maintenance_windows" ("entityId", "entityType", "fromDatetime", "toDatetime")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "maintenance_windows"`);
    await queryRunner.query(`ALTER TABLE "service_log" DROP COLUMN IF EXISTS "durationHours"`);
  }
}
