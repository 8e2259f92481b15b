/**
 * Ticket follow-up after a run
 */

export {
  assessOutcome,
  buildFailureComment,
  buildSuccessComment,
  updateTicket,
} from "./update.js";
export type {
  FinishedRun,
  OutcomeAssessment,
  RunOutcome,
  TicketUpdate,
  TicketUpdateOptions,
} from "./update.js";
