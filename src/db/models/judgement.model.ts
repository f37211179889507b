import mongoose, { Schema } from "mongoose";
import { IJudgementRecord } from "../interfaces/judgement.interface";
import { VERDICT } from "@/const/verdict.const";

const JudgementSchema = new Schema<IJudgementRecord>({
    _id : { type : String, required : true },
    submissionId : { type : String, required : true, index : true },
    verdict : { type : String, enum : [...Object.values(VERDICT), null], default : null },
    startTime : { type : String, required : true },
    startContestTime : { type : String, required : true },
    endTime : { type : String, default : null },
    endContestTime : { type : String, default : null },
    token : { type : Number, required : true },
})

export const JudgementModel = mongoose.model<IJudgementRecord>('Judgement', JudgementSchema)
