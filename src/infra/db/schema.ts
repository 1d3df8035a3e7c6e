import {
  bigint,
  date,
  doublePrecision,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const stockDailyDataTable = pgTable(
  "stock_daily_data",
  {
    id: serial("id").primaryKey(),
    symbol: text("symbol").notNull(),
    date: date("date", { mode: "string" }).notNull(),
    openPrice: doublePrecision("open_price").notNull(),
    highPrice: doublePrecision("high_price").notNull(),
    lowPrice: doublePrecision("low_price").notNull(),
    closePrice: doublePrecision("close_price").notNull(),
    volume: bigint("volume", { mode: "number" }),
    dailyChangePercentage: doublePrecision("daily_change_percentage"),
    extractionTimestamp: timestamp("extraction_timestamp", {
      withTimezone: true,
    }).notNull(),
  },
  (table) => ({
    symbolDateIdx: uniqueIndex("stock_daily_data_symbol_date_uidx").on(
      table.symbol,
      table.date,
    ),
  }),
);

export const symbolFetchStateTable = pgTable("symbol_fetch_state", {
  symbol: text("symbol").primaryKey(),
  lastFetchedOn: date("last_fetched_on", { mode: "string" }).notNull(),
  lastOutputSize: text("last_output_size", {
    enum: ["compact", "full"],
  }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

export type StockDailyDataInsert = typeof stockDailyDataTable.$inferInsert;
