/** What a step's action reports back to the sequencer */
export type StepResult =
  | { status: 'success' }
  | { status: 'failure'; detail: string };

/** An opaque provisioning operation. Its side effects belong to the collaborator behind it. */
export type StepAction = () => Promise<StepResult>;

/** A single named unit of provisioning work */
export interface Step {
  name: string;
  /** Every step is load-bearing: a failure always ends the run */
  required: true;
  action: StepAction;
}

/** Terminal result of a run. Carries no timing so equal inputs give equal outcomes. */
export type Outcome =
  | { type: 'completed'; steps_run: number }
  | { type: 'failed'; step: string; position: number; detail: string };

/** Progress notifications emitted while a sequence runs */
export type SequenceEvent =
  | { type: 'step:start'; step: string; position: number; total: number }
  | { type: 'step:passed'; step: string; position: number; total: number; duration_ms: number }
  | {
      type: 'step:failed';
      step: string;
      position: number;
      total: number;
      duration_ms: number;
      detail: string;
    };
