import type { Modality } from "./artifacts.js";

/*
Purpose: read-only view of the input dataset the orchestrator plans against.
Assumptions: labels carry no "sub-"/"ses-" prefix; file lists are ordered and absolute.
Usage: failures surface as DatasetIndexError and abort the run before planning.
*/
export interface DatasetIndex {
  readonly root: string;
  listParticipants(): Promise<string[]>;
  listSessions(participant: string): Promise<string[]>;
  filesFor(participant: string, modality: Modality, session?: string): Promise<string[]>;
}
