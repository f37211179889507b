import mongoose, { Schema } from "mongoose";
import { ISubmissionRecord } from "../interfaces/submission.interface";

const SubmissionSchema = new Schema<ISubmissionRecord>({
    _id : { type : String, required : true },
    teamId : { type : String, required : true },
    problemId : { type : String, required : true },
    languageId : { type : String, required : true },
    time : { type : String, required : true },
    contestTime : { type : String, required : true },
    files : { type : [{ href : String, mime : String, _id : false }], default : [] },
    token : { type : Number, required : true },
})

SubmissionSchema.index({ teamId: 1, problemId: 1 });

export const SubmissionModel = mongoose.model<ISubmissionRecord>('Submission', SubmissionSchema)
