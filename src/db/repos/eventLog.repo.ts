import mongoose, { ClientSession } from "mongoose";
import { injectable } from "inversify";
import logger from '@/utils/pinoLogger';
import { BaseRepository } from "./base.repo";
import { IEventLogRepo, PersistedLog } from "./interfaces/eventLog.repo.interface";
import { IEventRecord } from "../interfaces/event.interface";
import { EventModel } from "../models/event.model";
import { SubmissionModel } from "../models/submission.model";
import { JudgementModel } from "../models/judgement.model";
import { CounterModel, TOKEN_COUNTER_ID } from "../models/counter.model";
import { EVENT_TYPE } from "@/const/eventType.const";
import { FeedEventSchema } from "@/schemas/ccs.schema";
import { FeedEvent } from "@/types/ccs.types";
import { StoreCorruptError } from "@/utils/errors";

@injectable()
export class EventLogRepo extends BaseRepository<IEventRecord> implements IEventLogRepo {

    constructor(){
        super(EventModel);
    }

    async loadLog(): Promise<PersistedLog> {
        const startTime = Date.now();
        const operation = `loadLog:${this._model.modelName}`;
        try {
            logger.debug(`[REPO] Executing ${operation}`);
            const [counter, records] = await Promise.all([
                CounterModel.findById(TOKEN_COUNTER_ID).lean(),
                this._model.find().sort({ token: 1 }).lean(),
            ]);

            const events = records.map((record) => {
                const parsed = FeedEventSchema.safeParse({
                    token : record.token,
                    type : record.type,
                    op : record.op,
                    id : record.entityId,
                    data : record.data,
                });
                if (!parsed.success) {
                    throw new StoreCorruptError(`Stored event ${record.token} is not a valid feed event`, parsed.error);
                }
                return parsed.data;
            });

            const result = { counter: counter?.value ?? 0, events };
            logger.info(`[REPO] ${operation} successful`, { counter: result.counter, events: events.length, duration: Date.now() - startTime });
            return result;
        } catch (error) {
            logger.error(`[REPO] ${operation} failed`, { error, duration: Date.now() - startTime });
            throw error;
        }
    }

    async commit(
        event : FeedEvent
    ): Promise<void> {
        const startTime = Date.now();
        const operation = `commit:${this._model.modelName}`;
        try {
            logger.debug(`[REPO] Executing ${operation}`, { token: event.token, type: event.type, id: event.id });
            await mongoose.connection.transaction(async (session) => {
                await this._model.create([{
                    token : event.token,
                    type : event.type,
                    op : event.op,
                    entityId : event.id,
                    data : event.data,
                }], { session });
                await this.#project(event, session);
                await this.#advanceCounter(event.token, session);
            });
            logger.debug(`[REPO] ${operation} successful`, { token: event.token, duration: Date.now() - startTime });
        } catch (error) {
            logger.error(`[REPO] ${operation} failed`, { error, token: event.token, duration: Date.now() - startTime });
            throw error;
        }
    }

    async clear(): Promise<void> {
        await this.deleteAll();
        await SubmissionModel.deleteMany({});
        await JudgementModel.deleteMany({});
        await CounterModel.deleteMany({});
        logger.warn('[REPO] Cleared event log, projections and token counter');
    }

    async #project(event : FeedEvent, session : ClientSession): Promise<void> {
        if (event.type === EVENT_TYPE.SUBMISSIONS) {
            const submission = event.data;
            await SubmissionModel.updateOne(
                { _id : submission.id },
                { $set : {
                    teamId : submission.team_id,
                    problemId : submission.problem_id,
                    languageId : submission.language_id,
                    time : submission.time,
                    contestTime : submission.contest_time,
                    files : submission.files,
                    token : event.token,
                } },
                { upsert : true, session }
            );
        } else if (event.type === EVENT_TYPE.JUDGEMENTS) {
            const judgement = event.data;
            await JudgementModel.updateOne(
                { _id : judgement.id },
                { $set : {
                    submissionId : judgement.submission_id,
                    verdict : judgement.judgement_type_id,
                    startTime : judgement.start_time,
                    startContestTime : judgement.start_contest_time,
                    endTime : judgement.end_time,
                    endContestTime : judgement.end_contest_time,
                    token : event.token,
                } },
                { upsert : true, session }
            );
        }
    }

    // guarded by the previous value, so a stale writer aborts the transaction
    async #advanceCounter(token : number, session : ClientSession): Promise<void> {
        const updated = await CounterModel.findOneAndUpdate(
            { _id : TOKEN_COUNTER_ID, value : token - 1 },
            { $set : { value : token } },
            { session, new : true, upsert : token === 1 }
        );
        if (!updated) {
            throw new Error(`Token counter is not at ${token - 1}, refusing to write token ${token}`);
        }
    }
}
