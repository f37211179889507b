import { ScoreboardSnapshot } from "@/types/scoreboard.types";

/**
 * Interface defines the contract for any source of scoreboard snapshots
 *
 * @interface
 */
export interface IScoreboardProvider {

    /**
     * @throws {UpstreamFetchFailedError} when the snapshot could not be fetched or understood
     */
    fetchSnapshot() : Promise<ScoreboardSnapshot>;
}
