import type {
  DelegatedTask,
  Incident,
  InvestigationArea,
  InvestigationContext,
  InvestigationPhase,
  InvestigationResult,
  ReasoningProvider,
  Theory,
  TimelineEntry,
} from '@warroom/shared';
import { BaseAgent } from './agent.base.js';
import { assignSpecialist } from './specialists.js';
import { buildRootCausePrompt, COMMANDER_SYSTEM_CONTEXT } from './commander.prompts.js';

export const UNKNOWN_ROOT_CAUSE = 'Unknown - requires deeper investigation';
export const CONNECTION_POOL_ROOT_CAUSE =
  'Database connection pool exhaustion due to recent config change';
export const ERROR_RATE_ROOT_CAUSE =
  'Increased error rate due to code deployment or external dependency failure';

const LLM_CONFIDENCE = 0.85;
const RULES_CONFIDENCE = 0.5;

const PHASE_ORDER: readonly InvestigationPhase[] = [
  'initial',
  'delegating',
  'synthesizing',
  'concluding',
];

export interface CommanderContext {
  incident: Incident;
  investigationPriority: InvestigationArea[];
  timeline: TimelineEntry[];
}

export interface CommanderOptions {
  /** Simulated specialist turnaround after delegating. Defaults to 500 ms. */
  delegationDelayMs?: number;
  /** Simulated aggregation time while synthesizing. Defaults to 300 ms. */
  synthesisDelayMs?: number;
  /** Who gets each investigation area. Defaults to the fixed specialist table. */
  assignSpecialist?: (area: InvestigationArea) => string;
}

export interface RootCauseDetermination {
  rootCause: string;
  confidence: number;
  source: 'llm' | 'rules';
}

export class InvestigationPhaseError extends Error {
  constructor(from: InvestigationPhase, to: InvestigationPhase) {
    super(`Investigation cannot move back from "${from}" to "${to}"`);
    this.name = 'InvestigationPhaseError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Pick the order in which areas get looked at from the symptom wording. */
export function classifySymptom(symptom: string): {
  priority: InvestigationArea[];
  assessment: string;
} {
  const text = symptom.toLowerCase();
  if (text.includes('latency')) {
    return {
      priority: ['metrics', 'recent_changes', 'logs'],
      assessment: 'Latency issue detected. Likely performance-related.',
    };
  }
  if (text.includes('error')) {
    return {
      priority: ['logs', 'recent_changes', 'metrics'],
      assessment: 'Error spike detected. Likely code or infrastructure issue.',
    };
  }
  return {
    priority: ['logs', 'metrics', 'recent_changes'],
    assessment: 'Unclear symptom. Need comprehensive investigation.',
  };
}

/**
 * Drives an incident through assess → delegate → synthesize → conclude and
 * always ends with a root-cause decision. With a configured LLM the decision
 * comes from the model; without one, or when the model call fails, a small
 * rule set keyed on the symptom text decides instead.
 *
 * Delegation only records who would take each area: no specialist agents run.
 * `receiveTheory` is where their findings would come back in.
 *
 * A run is not cancellation-safe: stopping it mid-phase leaves the working
 * context as last written.
 */
export class IncidentCommander extends BaseAgent<
  CommanderContext,
  InvestigationContext,
  InvestigationResult
> {
  private phase: InvestigationPhase = 'initial';
  private readonly receivedTheories: Theory[] = [];
  private tasks: DelegatedTask[] = [];

  private readonly delegationDelayMs: number;
  private readonly synthesisDelayMs: number;
  private readonly assign: (area: InvestigationArea) => string;

  constructor(provider?: ReasoningProvider, options: CommanderOptions = {}) {
    super({ name: 'Commander', role: 'Incident Commander' }, provider);
    this.delegationDelayMs = options.delegationDelayMs ?? 500;
    this.synthesisDelayMs = options.synthesisDelayMs ?? 300;
    this.assign = options.assignSpecialist ?? assignSpecialist;
  }

  get investigationPhase(): InvestigationPhase {
    return this.phase;
  }

  get theories(): readonly Theory[] {
    return this.receivedTheories;
  }

  get assignedTasks(): readonly DelegatedTask[] {
    return this.tasks;
  }

  async run(input: InvestigationContext): Promise<InvestigationResult> {
    const incident = input.incident ?? {};

    // Fresh phase, tasks and context per run; injected theories stay.
    this.phase = 'initial';
    this.tasks = [];
    this.context = input.timeline ? { incident, timeline: input.timeline } : { incident };

    await this.assessIncident(incident);
    await this.delegateInvestigation();
    await this.synthesizeFindings();
    const { rootCause, confidence } = await this.determineRootCause();

    return {
      status: 'resolved',
      rootCause,
      confidence,
      timeline: this.context.timeline ?? [],
    };
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  /** Phase 1: read the incident and decide where to look first. */
  async assessIncident(incident: Incident): Promise<InvestigationArea[]> {
    this.think('Beginning incident assessment...');

    const symptom = incident.symptom ?? 'Unknown issue';
    const severity = incident.severity ?? 'unknown';
    const service = incident.service ?? 'unknown';
    this.think(`Incident: ${symptom} on ${service}`, { severity });

    const { priority, assessment } = classifySymptom(symptom);
    this.think(assessment);

    this.updateContext({ incident, investigationPriority: priority });
    this.decide(`Investigation priority: ${priority.join(' > ')}`, { priority });
    return priority;
  }

  /** Phase 2: hand each area to its specialist. */
  async delegateInvestigation(): Promise<void> {
    this.enterPhase('delegating');

    for (const area of this.context.investigationPriority ?? []) {
      this.think(`Need to investigate: ${area}`);

      const task: DelegatedTask = { area, assignedTo: this.assign(area), status: 'pending' };
      this.tasks.push(task);
      this.emitEvent('action', `Delegating ${area} investigation to ${task.assignedTo}`, {
        task: { ...task },
      });
    }

    await sleep(this.delegationDelayMs);
  }

  /** Phase 3: gather whatever theories came back. */
  async synthesizeFindings(): Promise<void> {
    this.enterPhase('synthesizing');
    this.think('Synthesizing findings from investigation teams...');

    await sleep(this.synthesisDelayMs);

    this.observe('Received theories from investigation teams', {
      theoryCount: this.receivedTheories.length,
    });
  }

  /** Phase 4: settle on a root cause and announce it. */
  async determineRootCause(): Promise<RootCauseDetermination> {
    this.enterPhase('concluding');
    this.think('Analyzing all evidence to determine root cause...');

    const incident = this.context.incident ?? {};
    const determination = this.hasReasoning
      ? await this.reasonAboutRootCause(incident)
      : this.applyRules(incident);
    const { rootCause, confidence } = determination;

    this.think(`Root cause analysis complete. Confidence: ${Math.round(confidence * 100)}%`, {
      confidence,
    });
    this.decide(`ROOT CAUSE: ${rootCause}`, { confidence, rootCause });
    return determination;
  }

  /** Accept a finding from another investigator. */
  receiveTheory(theory: Theory): void {
    this.receivedTheories.push(theory);
    this.observe(`Received theory: ${theory.description || 'Unknown'}`, {
      source: theory.agent ?? 'Unknown',
    });
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private enterPhase(next: InvestigationPhase): void {
    if (PHASE_ORDER.indexOf(next) < PHASE_ORDER.indexOf(this.phase)) {
      throw new InvestigationPhaseError(this.phase, next);
    }
    this.phase = next;
  }

  private async reasonAboutRootCause(incident: Incident): Promise<RootCauseDetermination> {
    this.think('Using LLM reasoning to analyze incident...');

    try {
      const prompt = buildRootCausePrompt(incident, this.context.investigationPriority ?? []);
      const response = await this.reason(prompt, { systemContext: COMMANDER_SYSTEM_CONTEXT });
      const rootCause = response.trim();
      if (!rootCause) {
        throw new Error('LLM returned an empty answer');
      }
      return { rootCause, confidence: LLM_CONFIDENCE, source: 'llm' };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.think(`LLM reasoning failed: ${message}. Falling back to rule-based analysis.`);
      return this.applyRules(incident);
    }
  }

  private applyRules(incident: Incident): RootCauseDetermination {
    return {
      rootCause: this.ruleBasedRootCause(incident),
      confidence: RULES_CONFIDENCE,
      source: 'rules',
    };
  }

  private ruleBasedRootCause(incident: Incident): string {
    if (Object.keys(incident).length === 0) {
      return UNKNOWN_ROOT_CAUSE;
    }

    const symptom = (incident.symptom ?? '').toLowerCase();
    if (symptom.includes('latency')) {
      this.think('Evidence pattern matches: latency spike + recent deploy + database metrics', {
        pattern: 'connection_pool_exhaustion',
      });
      return CONNECTION_POOL_ROOT_CAUSE;
    }
    if (symptom.includes('error')) {
      return ERROR_RATE_ROOT_CAUSE;
    }
    return UNKNOWN_ROOT_CAUSE;
  }
}
