/**
 * Registry Table
 *
 * drizzle-orm definition of the persisted registry used by the postgres driver.
 */

import { bigint, boolean, pgTable, serial, text, uniqueIndex, varchar } from 'drizzle-orm/pg-core'

export const monitoringMetrics = pgTable(
  'monitoring_metrics',
  {
    id: serial('id').primaryKey(),
    component: varchar('component', { length: 100 }).notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    enabled: boolean('enabled').notNull().default(false),
    config: text('config'),
    timecreated: bigint('timecreated', { mode: 'number' }).notNull(),
    timemodified: bigint('timemodified', { mode: 'number' }).notNull(),
    usermodified: varchar('usermodified', { length: 255 }).notNull(),
  },
  (table) => [uniqueIndex('monitoring_metrics_component_name_unique').on(table.component, table.name)]
)

export type MonitoringMetricRecord = typeof monitoringMetrics.$inferSelect
export type NewMonitoringMetricRecord = typeof monitoringMetrics.$inferInsert
