import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

const signalList = z.array(z.string().trim().min(1)).min(1);

const DestinationSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  output: z.enum(["chart", "table"]).default("chart"),
  signals: signalList
});

const RoutingSchema = z
  .object({
    generalDestination: z.string().min(1),
    tieBreakOrder: z.array(z.string().min(1)).default([]),
    destinations: z.array(DestinationSchema).min(1)
  })
  .superRefine((routing, ctx) => {
    const ids = new Set(routing.destinations.map((destination) => destination.id));
    if (ids.size !== routing.destinations.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "routing.destinations ids must be unique"
      });
    }
    if (ids.has(routing.generalDestination)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "routing.generalDestination must not carry signals"
      });
    }
    routing.tieBreakOrder.forEach((id) => {
      if (!ids.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `routing.tieBreakOrder names unknown destination ${id}`
        });
      }
    });
  });

const BackendTargetSchema = z.object({
  spaceName: z.string().min(1),
  flowId: z.string().min(1)
});

const aliasList = z.array(z.string().min(1)).min(1);

const ChartsSchema = z.object({
  dataField: z.string().min(1),
  xCandidates: z.array(z.string().min(1)),
  aliases: z.object({
    kind: aliasList,
    x: aliasList,
    y: aliasList,
    color: aliasList
  })
});

export const AppConfigSchema = z.object({
  routing: RoutingSchema,
  backend: z.record(BackendTargetSchema),
  charts: ChartsSchema
});

export type DestinationConfig = z.infer<typeof DestinationSchema>;
export type RoutingConfig = z.infer<typeof RoutingSchema>;
export type BackendTarget = z.infer<typeof BackendTargetSchema>;
export type ChartConfig = z.infer<typeof ChartsSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_CHART_CONFIG: ChartConfig = {
  dataField: "data",
  xCandidates: ["Date", "date", "time", "Time", "timestamp", "Timestamp"],
  aliases: {
    kind: ["chart_type", "chartType", "type", "kind"],
    x: ["x", "xs", "x_col", "x_column", "xField", "x_axis"],
    y: ["y", "ys", "y_col", "y_column", "y_columns", "yField", "yFields", "y_axis"],
    color: ["color", "colour", "colorField", "color_field"]
  }
};

export const DEFAULT_CONFIG: AppConfig = {
  routing: {
    generalDestination: "general",
    tieBreakOrder: ["table", "chart"],
    destinations: [
      {
        id: "chart",
        label: "Visualization",
        output: "chart",
        signals: ["chart", "plot", "graph", "visualize", "visualization", "candlestick"]
      },
      {
        id: "table",
        label: "Data table",
        output: "table",
        signals: ["table", "raw data", "select", "limit", "sql", "query", "dataset"]
      }
    ]
  },
  backend: {},
  charts: DEFAULT_CHART_CONFIG
};

function resolveConfigPath(): string {
  const override = process.env.CONFIG_PATH?.trim();
  return resolve(process.cwd(), override || "config.json");
}

export function parseConfig(input: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config: ${issues}`);
  }
  return result.data;
}

export function loadConfig(path: string = resolveConfigPath()): AppConfig {
  try {
    const raw = readFileSync(path, "utf-8");
    return parseConfig(JSON.parse(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[config] using built-in defaults (${reason})`);
    return DEFAULT_CONFIG;
  }
}
