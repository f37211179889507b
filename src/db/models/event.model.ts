import mongoose, { Schema } from "mongoose";
import { IEventRecord } from "../interfaces/event.interface";
import { EVENT_OP, EVENT_TYPE } from "@/const/eventType.const";

const EventSchema = new Schema<IEventRecord>({
    token : { type : Number, required : true, unique : true },
    type : { type : String, enum : Object.values(EVENT_TYPE), required : true },
    op : { type : String, enum : Object.values(EVENT_OP), required : true },
    entityId : { type : String, default : null },
    data : { type : Schema.Types.Mixed, required : true },
},{ timestamps : { createdAt : true, updatedAt : false }, minimize : false })

export const EventModel = mongoose.model<IEventRecord>('Event', EventSchema)
