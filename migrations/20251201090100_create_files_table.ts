import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('files', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('kind', 16).notNullable(); // photo | flag | consent_form
    table.string('owner_kind', 16).notNullable(); // country | person
    table.uuid('owner_id').notNullable();
    table.string('format', 8).notNullable(); // sniffed: png | jpeg | pdf
    table.string('filename', 255).notNullable();
    table.string('storage_key', 255).notNullable().unique();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.index(['owner_kind', 'owner_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('files');
}
