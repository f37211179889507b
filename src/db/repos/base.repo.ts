import { ClientSession, Model } from "mongoose";
import { injectable, unmanaged } from "inversify";
import logger from '@/utils/pinoLogger';

@injectable()
export abstract class BaseRepository<T> {
    protected _model : Model<T>;

    constructor(@unmanaged() model : Model<T>){
        this._model = model;
    }

    async deleteAll(
        session? : ClientSession
    ): Promise<number> {
        const startTime = Date.now();
        const operation = `deleteAll:${this._model.modelName}`;
        try {
            logger.debug(`[REPO] Executing ${operation}`);
            const result = await this._model.deleteMany({}, { session });
            logger.info(`[REPO] ${operation} successful`, { deleted: result.deletedCount, duration: Date.now() - startTime });
            return result.deletedCount;
        } catch (error) {
            logger.error(`[REPO] ${operation} failed`, { error, duration: Date.now() - startTime });
            throw error;
        }
    }
}
