import type { SchemaObject } from "ajv";

const SLUG_PATTERN = "^[a-z0-9]+(?:-[a-z0-9]+)*$";
const TIME_PATTERN = "^([01][0-9]|2[0-3]):[0-5][0-9]$";

const disabledPolicySchema: SchemaObject = {
  oneOf: [
    {
      type: "object",
      required: ["kind"],
      additionalProperties: false,
      properties: { kind: { enum: ["enabled", "disabled"] } },
    },
    {
      type: "object",
      required: ["kind", "date"],
      additionalProperties: false,
      properties: { kind: { const: "until" }, date: { type: "string", format: "date" } },
    },
    {
      type: "object",
      required: ["kind", "days"],
      additionalProperties: false,
      properties: { kind: { const: "for" }, days: { type: "integer", minimum: 1 } },
    },
  ],
};

export const TaskConfigRecordSchema: SchemaObject = {
  type: "object",
  required: ["task"],
  additionalProperties: false,
  properties: {
    slug: { type: "string", pattern: SLUG_PATTERN },
    task: { type: "string", minLength: 1 },
    description: { type: "string" },
    weight: { type: "number", minimum: 0 },
    spoons: { type: "integer", minimum: 1 },
    maxOccurrences: { type: "integer", minimum: 0 },
    minFrequency: { type: "integer", minimum: 0 },
    disabled: disabledPolicySchema,
    tags: { type: "array", items: { type: "string" } },
  },
};

export const ConfigDocumentSchema: SchemaObject = {
  $id: "dailydraw/config-document",
  type: "object",
  additionalProperties: false,
  properties: {
    cutOff: { type: "string", pattern: TIME_PATTERN },
    selection: {
      oneOf: [
        {
          type: "object",
          required: ["mode", "dailyTasks"],
          additionalProperties: false,
          properties: { mode: { const: "count" }, dailyTasks: { type: "integer", minimum: 0 } },
        },
        {
          type: "object",
          required: ["mode", "dailySpoons"],
          additionalProperties: false,
          properties: { mode: { const: "spoons" }, dailySpoons: { type: "integer", minimum: 0 } },
        },
      ],
    },
    tasks: { type: "array", items: TaskConfigRecordSchema },
  },
};

export const StateDocumentSchema: SchemaObject = {
  $id: "dailydraw/state-document",
  type: "object",
  additionalProperties: false,
  properties: {
    lastGenerated: { type: "string", format: "date-time" },
    tasks: {
      type: "object",
      propertyNames: { type: "string", pattern: SLUG_PATTERN },
      additionalProperties: {
        type: "object",
        additionalProperties: false,
        properties: {
          completed: { type: "boolean" },
          timesCompleted: { type: "integer", minimum: 0 },
          lastChosen: { type: "string", format: "date" },
          disabledOn: { type: "string", format: "date" },
        },
      },
    },
    todaysTasks: {
      type: "array",
      uniqueItems: true,
      items: { type: "string", pattern: SLUG_PATTERN },
    },
  },
};
