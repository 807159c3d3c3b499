import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('countries', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('code', 16).notNullable();
    table.string('name', 255).notNullable();
    table.boolean('is_staff').notNullable().defaultTo(false);
    table.boolean('participants_ok').notNullable().defaultTo(true);
    table.string('contact_email', 255).nullable();
    table.jsonb('contact_extra').notNullable().defaultTo('[]');
    table.integer('expected_leaders').notNullable().defaultTo(0);
    table.integer('expected_deputies').notNullable().defaultTo(0);
    table.integer('expected_contestants').notNullable().defaultTo(0);
    table.integer('expected_observers_a').notNullable().defaultTo(0);
    table.integer('expected_observers_b').notNullable().defaultTo(0);
    table.integer('expected_observers_c').notNullable().defaultTo(0);
    table.integer('expected_single_rooms').notNullable().defaultTo(0);
    table.boolean('numbers_confirmed').notNullable().defaultTo(false);
    table.text('generic_url').nullable();
    table.uuid('flag_id').nullable();
    table.string('leader_email', 255).nullable();
    table.text('physical_address').nullable();
    table.boolean('retired').notNullable().defaultTo(false);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
  });

  // Codes and names are unique among current countries only
  await knex.raw(
    'CREATE UNIQUE INDEX countries_code_current_unique ON countries (code) WHERE NOT retired'
  );
  await knex.raw(
    'CREATE UNIQUE INDEX countries_name_current_unique ON countries (name) WHERE NOT retired'
  );

  await knex.schema.createTable('people', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.uuid('country_id').notNullable().references('id').inTable('countries');
    table.string('primary_role', 64).notNullable();
    table.jsonb('other_roles').notNullable().defaultTo('[]');
    table.jsonb('guide_for').notNullable().defaultTo('[]');
    table.string('given_name', 255).notNullable();
    table.string('family_name', 255).notNullable();
    table.string('passport_given_name', 255).nullable();
    table.string('passport_family_name', 255).nullable();
    table.string('gender', 64).nullable();
    table.string('date_of_birth', 10).nullable();
    table.jsonb('languages').notNullable().defaultTo('[]');
    table.text('diet').nullable();
    table.string('tshirt', 16).nullable();
    for (const leg of ['arrival', 'departure']) {
      table.string(`${leg}_place`, 255).nullable();
      table.string(`${leg}_date`, 10).nullable();
      table.string(`${leg}_hour`, 2).nullable();
      table.string(`${leg}_minute`, 2).nullable();
      table.string(`${leg}_flight`, 64).nullable();
    }
    table.string('room_type', 64).nullable();
    table.string('room_share_with', 255).nullable();
    table.string('room_number', 64).nullable();
    table.string('phone_number', 64).nullable();
    table.string('passport_number', 64).nullable();
    table.string('nationality', 255).nullable();
    table.boolean('incomplete').notNullable().defaultTo(false);
    table.uuid('photo_id').nullable();
    table.uuid('consent_form_id').nullable();
    table.boolean('event_photos_consent').nullable();
    table.string('photo_consent', 16).nullable();
    table.boolean('diet_consent').nullable();
    table.text('generic_url').nullable();
    table.boolean('retired').notNullable().defaultTo(false);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.index('country_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('people');
  await knex.schema.dropTableIfExists('countries');
}
