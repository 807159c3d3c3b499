import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('scores', (table) => {
    table.uuid('person_id').notNullable().references('id').inTable('people');
    table.integer('problem').notNullable();
    table.integer('score').notNullable();
    table.primary(['person_id', 'problem']);
  });

  await knex.schema.createTable('event_state', (table) => {
    table.integer('id').primary();
    table.integer('version').notNullable().defaultTo(0);
    table.boolean('registration_enabled').notNullable().defaultTo(true);
    table.boolean('preregistration_enabled').notNullable().defaultTo(true);
    table.boolean('self_scoring_enabled').notNullable().defaultTo(false);
    table.integer('gold').nullable();
    table.integer('silver').nullable();
    table.integer('bronze').nullable();
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
  });

  // Boundaries are set or unset together
  await knex.raw(`
    ALTER TABLE event_state ADD CONSTRAINT event_state_medals_all_or_none CHECK (
      (gold IS NULL AND silver IS NULL AND bronze IS NULL)
      OR (gold IS NOT NULL AND silver IS NOT NULL AND bronze IS NOT NULL)
    )
  `);

  await knex('event_state').insert({ id: 1 });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('event_state');
  await knex.schema.dropTableIfExists('scores');
}
