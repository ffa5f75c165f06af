import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('customers', (table) => {
    table.bigIncrements('id');
    table.string('name', 255).notNullable();
    table.string('email', 254).notNullable().defaultTo('');
    table.string('phone', 20).notNullable().defaultTo('');
    table.text('address').notNullable().defaultTo('');
    table.string('tax_id', 50).notNullable().defaultTo('');
    table.decimal('total_spent', 10, 2).notNullable().defaultTo(0);
    table.integer('visit_count').notNullable().defaultTo(0);
    table.text('notes').notNullable().defaultTo('');
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('last_purchase_at', { useTz: true }).nullable();

    table.index(['name'], 'idx_customers_name');
    table.index(['phone'], 'idx_customers_phone');
    table.index(['email'], 'idx_customers_email');
  });

  await knex.raw('CREATE INDEX idx_customers_created_at ON customers (created_at DESC)');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('customers');
}
