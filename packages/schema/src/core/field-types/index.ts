import type { FieldType, LogicalType } from "../../ports/field-type"
import { blob } from "./blob"
import { boolean } from "./boolean"
import { double } from "./double"
import { bigint, int } from "./integer"
import { ascii, text } from "./text"
import { timestamp } from "./timestamp"
import { timeuuid, uuid } from "./uuid"

export const fieldTypes = {
  text,
  ascii,
  uuid,
  timeuuid,
  timestamp,
  int,
  bigint,
  boolean,
  double,
  blob,
} as const satisfies Record<LogicalType, FieldType<unknown>>

export { isUuid, type Uuid } from "./uuid"
