import { z } from "zod";
import type { AllowedTable, ColumnType } from "../types";

export const ColumnDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["numeric", "text", "temporal", "boolean", "unknown"]),
  sqlType: z.string().min(1),
  description: z.string().default("")
});

export const TableDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  columns: z.array(ColumnDefinitionSchema).min(1)
});

export const SchemaCatalogSchema = z.object({
  tables: z.array(TableDefinitionSchema).min(1)
});

export type ColumnDefinition = z.infer<typeof ColumnDefinitionSchema>;
export type TableDefinition = z.infer<typeof TableDefinitionSchema>;
export type SchemaCatalog = z.infer<typeof SchemaCatalogSchema>;

function column(name: string, type: ColumnType, sqlType: string, description: string): ColumnDefinition {
  return { name, type, sqlType, description };
}

export const ARGO_SCHEMA: SchemaCatalog = {
  tables: [
    {
      name: "argo_profiles",
      description: "One row per ARGO float profile (cycle), with depth-averaged measurements.",
      columns: [
        column("id", "numeric", "SERIAL", "Row identifier"),
        column("platform_id", "numeric", "INTEGER", "Float identifier (WMO platform number)"),
        column("cycle_number", "numeric", "INTEGER", "Profile cycle number for the float"),
        column("timestamp", "temporal", "TIMESTAMP", "Time the profile was recorded (UTC)"),
        column("latitude", "numeric", "DOUBLE PRECISION", "Profile latitude in decimal degrees"),
        column("longitude", "numeric", "DOUBLE PRECISION", "Profile longitude in decimal degrees"),
        column("pressure", "numeric", "DOUBLE PRECISION", "Sea pressure in decibar"),
        column("temperature", "numeric", "DOUBLE PRECISION", "In-situ temperature in degrees Celsius"),
        column("salinity", "numeric", "DOUBLE PRECISION", "Practical salinity (PSU)")
      ]
    }
  ]
};

/** Lower-cased table name → lower-cased column names. */
export function buildAllowList(catalog: SchemaCatalog): Map<string, Set<string>> {
  return new Map(
    catalog.tables.map((table) => [
      table.name.toLowerCase(),
      new Set(table.columns.map((entry) => entry.name.toLowerCase()))
    ])
  );
}

export function toAllowedTables(catalog: SchemaCatalog): AllowedTable[] {
  return catalog.tables.map((table) => ({
    table: table.name,
    columns: table.columns.map((entry) => entry.name)
  }));
}

export function describeSchema(catalog: SchemaCatalog): string {
  return catalog.tables
    .map((table) => {
      const header = table.description ? `Table ${table.name}: ${table.description}` : `Table ${table.name}`;
      const columns = table.columns.map((entry) => {
        const suffix = entry.description ? ` - ${entry.description}` : "";
        return `  - ${entry.name} (${entry.sqlType})${suffix}`;
      });
      return [header, ...columns].join("\n");
    })
    .join("\n\n");
}
