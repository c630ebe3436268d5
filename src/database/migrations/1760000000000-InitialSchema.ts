import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial database schema migration
 *
 * Creates the following tables:
 * - metric_samples (time series, natural key on entity/metric/timestamp)
 * - service_log (completed maintenance, polymorphic over entity_type_enum)
 * - equipment_assignment (spreader -> crane membership)
 *
 * Every statement is guarded so re-running against a partially built
 * database is a no-op.
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: Pick<QueryRunner, 'query'>): Promise<void> {
    await queryRunner.query(`
      DO $$ BEGIN
        CREATE TYPE "public"."entity_type_enum" AS ENUM('crane', 'spreader');
      EXCEPTION
        WHEN duplicate_object THEN NULL;
      END $$
    `);

    // ============================================================
    // TIME SERIES: Metric Samples
    // Append-only; natural key makes ingestion idempotent and its PK index
    // serves latest / at-or-before / earliest lookups per entity and metric
    // ============================================================
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "metric_samples" (
        "entityId" varchar(64) NOT NULL,
        "metricName" varchar(255) NOT NULL,
        "timestamp" TIMESTAMP WITH TIME ZONE NOT NULL,
        "value" text NOT NULL,
        "numericValue" double precision,
        "ingestedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_metric_samples" PRIMARY KEY ("entityId", "metricName", "timestamp")
      )
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_metric_samples_timestamp"
      ON "metric_samples" ("timestamp")
    `);

    // ============================================================
    // SERVICE LOG
    // ============================================================
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "service_log" (
        "id" SERIAL NOT NULL,
        "entityId" varchar(64) NOT NULL,
        "entityType" "public"."entity_type_enum" NOT NULL,
        "taskId" varchar(128) NOT NULL,
        "serviceDate" TIMESTAMP WITH TIME ZONE NOT NULL,
        "servicedAtValue" double precision,
        "servicedBy" varchar(128),
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_service_log" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_service_log_entity_task_date"
      ON "service_log" ("entityId", "entityType", "taskId", "serviceDate")
    `);

    // ============================================================
    // EQUIPMENT ASSIGNMENT
    // ============================================================
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "equipment_assignment" (
        "compositeEntityId" varchar(64) NOT NULL,
        "memberEntityId" varchar(64) NOT NULL,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_equipment_assignment" PRIMARY KEY ("compositeEntityId", "memberEntityId")
      )
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_equipment_assignment_member"
      ON "equipment_assignment" ("memberEntityId")
    `);
  }

  public async down(queryRunner: Pick<QueryRunner, 'query'>): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "equipment_assignment"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "service_log"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "metric_samples"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "public"."entity_type_enum"`);
  }
}
