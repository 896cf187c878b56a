import { Type, type Static } from "@sinclair/typebox";

const PositiveInteger = Type.Integer({ minimum: 1 });

export const ScorerNameSchema = Type.Union([
  Type.Literal("frequency"),
  Type.Literal("recency"),
  Type.Literal("decaying-frequency"),
]);

/** Shape of `config.json`; every field is optional and falls back to a default. */
export const CmdtrailConfigFileSchema = Type.Object(
  {
    $schema: Type.Optional(Type.String()),
    machine: Type.Optional(Type.Union([Type.String({ minLength: 1 }), Type.Null()])),
    sync: Type.Optional(
      Type.Object(
        {
          root: Type.Optional(Type.Union([Type.String({ minLength: 1 }), Type.Null()])),
          intervalMs: Type.Optional(Type.Integer({ minimum: 1_000 })),
          recentLimit: Type.Optional(PositiveInteger),
        },
        { additionalProperties: false },
      ),
    ),
    persistence: Type.Optional(
      Type.Object(
        {
          compactAfterEvents: Type.Optional(PositiveInteger),
        },
        { additionalProperties: false },
      ),
    ),
    search: Type.Optional(
      Type.Object(
        {
          maxResults: Type.Optional(PositiveInteger),
          batchSize: Type.Optional(PositiveInteger),
          scorer: Type.Optional(ScorerNameSchema),
          halfLifeDays: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
        },
        { additionalProperties: false },
      ),
    ),
    logging: Type.Optional(
      Type.Object(
        {
          maxBytes: Type.Optional(PositiveInteger),
          maxFiles: Type.Optional(PositiveInteger),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type CmdtrailConfigFile = Static<typeof CmdtrailConfigFileSchema>;
