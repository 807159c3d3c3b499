import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('accounts', (table) => {
    table.string('username', 64).primary();
    table.text('password_hash').notNullable(); // argon2
    table.uuid('country_id').notNullable().references('id').inTable('countries');
    // set for self-registration accounts, null for country delegates
    table.uuid('person_id').nullable().references('id').inTable('people');
    table.boolean('retired').notNullable().defaultTo(false);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('accounts');
}
