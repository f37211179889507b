import mongoose, { Schema } from "mongoose";
import { ICounterRecord } from "../interfaces/counter.interface";

export const TOKEN_COUNTER_ID = 'event-token';

const CounterSchema = new Schema<ICounterRecord>({
    _id : { type : String, required : true },
    value : { type : Number, required : true, default : 0 },
})

export const CounterModel = mongoose.model<ICounterRecord>('Counter', CounterSchema)
