import mongoose, { Schema, type Model } from "mongoose";
import { entityTypes, roles, type EntityType, type Role } from "../../utils/constants.js";

export interface EventLogDoc {
  entityType: EntityType;
  entityId: string;
  action: string;
  actorUserId: string;
  roleAtTime: Role;
  timestamp: Date;
  notes?: string;
  diff?: unknown;
}

const eventLogSchema = new Schema<EventLogDoc>(
  {
    entityType: {
      type: String,
      enum: entityTypes,
      required: true,
    },
    entityId: { type: String, required: true },
    action: { type: String, required: true },
    // "system" for gateway callbacks and workers
    actorUserId: { type: String, required: true, index: true },
    roleAtTime: { type: String, enum: roles, required: true },
    timestamp: { type: Date, required: true, index: true },
    notes: { type: String },
    diff: { type: Schema.Types.Mixed },
  },
  { collection: "eventLogs" },
);
eventLogSchema.index({ entityType: 1, entityId: 1 });

export const EventLogModel: Model<EventLogDoc> =
  mongoose.models.EventLog ?? mongoose.model<EventLogDoc>("EventLog", eventLogSchema);
