import { randomUUID } from 'crypto';
import { JobPosting, JobPostingDraft } from '../../types/job';
import { fail } from '../../types/result';
import { ValidationError, ValidationOutcome, invalid } from '../../types/validation';
import { CancelledError, ValidationFailedError, describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { CostBreakdown, computeCost } from '../cost/cost.calculator';
import { CoreResult, DraftLifecycleCoordinator } from '../drafts/draft.coordinator';
import { JobField, validateField } from '../validation/job.validators';

const TAG = 'FormSession';

/** Raw form input; amounts stay as typed text until validated. */
export interface FormValues {
  title: string;
  description: string;
  salaryAmount: string;
  salaryUnit: string;
  durationAmount: string;
  durationUnit: string;
  state: string;
  district: string;
  latitude: number | null;
  longitude: number | null;
}

export type FormField = keyof FormValues;

export type SessionState = 'editing' | 'publishing' | 'published' | 'discarded';

const FIELD_GROUPS: Record<FormField, JobField> = {
  title: 'title',
  description: 'description',
  salaryAmount: 'salary',
  salaryUnit: 'salary',
  durationAmount: 'duration',
  durationUnit: 'duration',
  state: 'location',
  district: 'location',
  latitude: 'location',
  longitude: 'location',
};

const FORM_GROUPS: readonly JobField[] = ['title', 'description', 'salary', 'duration', 'location'];

const REQUIRED_FIELDS: readonly FormField[] = [
  'title',
  'description',
  'salaryAmount',
  'durationAmount',
  'state',
  'district',
];

const DURATION_PATTERN = /^\d+$/;

export const EMPTY_FORM: Readonly<FormValues> = {
  title: '',
  description: '',
  salaryAmount: '',
  salaryUnit: 'monthly',
  durationAmount: '',
  durationUnit: 'days',
  state: '',
  district: '',
  latitude: null,
  longitude: null,
};

export interface FormSessionOptions {
  draftId?: string;
  /** Set when editing an already published posting. */
  sourceJobId?: string;
  initial?: Partial<FormValues>;
  /** The draft already exists in the store. */
  persisted?: boolean;
}

export class SessionStateError extends Error {
  constructor(public readonly state: SessionState) {
    super(`Form session is ${state}`);
    this.name = 'SessionStateError';
  }
}

const fieldError = (field: string, message: string, kind: ValidationError['kind']): ValidationOutcome =>
  invalid([{ field, message, kind }]);

const isBlank = (value: string) => value.trim().length === 0;

const toAmount = (text: string) => (isBlank(text) ? NaN : Number(text));

// A blank draft stores 0 or NaN; both reopen as an empty field.
const amountText = (amount: number) => (Number.isFinite(amount) && amount !== 0 ? String(amount) : '');

export const formValuesFromDraft = (draft: JobPostingDraft): FormValues => ({
  title: draft.title,
  description: draft.description,
  salaryAmount: amountText(draft.salaryAmount),
  salaryUnit: draft.salaryUnit,
  durationAmount: amountText(draft.durationAmount),
  durationUnit: draft.durationUnit,
  state: draft.location.state,
  district: draft.location.district,
  latitude: draft.location.latitude ?? null,
  longitude: draft.location.longitude ?? null,
});

/**
 * State of one draft-editing form. One owner mutates it at a time; the host
 * serializes calls. Every mutation validates the touched field group, keeps
 * the cost breakdown current and, once the form is complete, autosaves.
 */
export class FormSessionController {
  readonly draftId: string;
  readonly sourceJobId?: string;

  private values: FormValues;
  private errors = new Map<JobField, ValidationError>();
  private dirty = false;
  private revision = 0;
  private persisted: boolean;
  private sessionState: SessionState = 'editing';
  private cost: CostBreakdown;
  private savedAt: string | null = null;

  private readonly abort = new AbortController();
  private saveQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly coordinator: DraftLifecycleCoordinator,
    options: FormSessionOptions = {}
  ) {
    this.draftId = options.draftId ?? randomUUID();
    this.sourceJobId = options.sourceJobId;
    this.values = { ...EMPTY_FORM, ...options.initial };
    this.persisted = options.persisted ?? false;
    this.cost = this.computeCost();
    // Seeded values are validated so the error map reflects them.
    if (options.initial) this.validateAllFields();
  }

  /** Reopen a stored draft. */
  static async resume(
    coordinator: DraftLifecycleCoordinator,
    draftId: string,
    sourceJobId?: string
  ): Promise<CoreResult<FormSessionController>> {
    const loaded = await coordinator.getDraft(draftId);
    if (!loaded.success) return loaded;

    const session = new FormSessionController(coordinator, {
      draftId,
      sourceJobId,
      initial: formValuesFromDraft(loaded.data),
      persisted: true,
    });
    return { success: true, data: session };
  }

  /** Open an edit session on a published posting. */
  static async fromJob(
    coordinator: DraftLifecycleCoordinator,
    jobId: string
  ): Promise<CoreResult<FormSessionController>> {
    const created = await coordinator.createDraftFromJob(jobId);
    if (!created.success) return created;

    const session = new FormSessionController(coordinator, {
      draftId: created.data.id,
      sourceJobId: jobId,
      initial: formValuesFromDraft(created.data),
      persisted: true,
    });
    return { success: true, data: session };
  }

  get state(): SessionState {
    return this.sessionState;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get costBreakdown(): CostBreakdown {
    return this.cost;
  }

  get lastSavedAt(): string | null {
    return this.savedAt;
  }

  getValues(): Readonly<FormValues> {
    return { ...this.values };
  }

  getErrors(): Partial<Record<JobField, ValidationError>> {
    return Object.fromEntries(this.errors);
  }

  getFieldError(field: FormField): ValidationError | undefined {
    return this.errors.get(FIELD_GROUPS[field]);
  }

  /** No recorded errors and every required field filled in. */
  isValid(): boolean {
    return this.errors.size === 0 && REQUIRED_FIELDS.every((field) => !this.isFieldBlank(field));
  }

  isEmpty(): boolean {
    return REQUIRED_FIELDS.every((field) => this.isFieldBlank(field));
  }

  setField<K extends FormField>(field: K, value: FormValues[K]): void {
    this.assertEditing();

    this.values = { ...this.values, [field]: value };
    this.dirty = true;
    this.revision += 1;

    const group = FIELD_GROUPS[field];
    this.applyOutcome(group, this.validateGroup(group));

    if (group === 'salary' || group === 'duration') {
      this.cost = this.computeCost();
    }

    if (this.isValid() && this.dirty) {
      this.queueAutosave();
    }
  }

  /** Resolves once every queued autosave has settled. */
  async flush(): Promise<void> {
    await this.saveQueue;
  }

  /**
   * Validate the whole form and, when it passes, persist and publish it.
   * Validation errors come back unchanged and nothing is written. Once the
   * session is closed, the outcome is dropped and `CancelledError` returned.
   */
  async submit(): Promise<CoreResult<JobPosting>> {
    this.assertEditing();

    this.validateAllFields();
    if (this.errors.size > 0) {
      return fail(new ValidationFailedError(FORM_GROUPS.flatMap((group) => this.errors.get(group) ?? [])));
    }

    const draft = this.toDraft();
    const outcome = this.coordinator.validateDraft(draft);
    if (!outcome.valid) {
      for (const error of outcome.errors) {
        if (this.isFormGroup(error.field)) this.errors.set(error.field, error);
      }
      return fail(new ValidationFailedError(outcome.errors));
    }

    this.sessionState = 'publishing';
    const { signal } = this.abort;
    await this.flush();
    if (signal.aborted) return fail(new CancelledError('submit'));

    const saved = await this.coordinator.saveDraft(draft, { signal });
    if (signal.aborted) return fail(new CancelledError('submit'));
    if (!saved.success) {
      this.settleAfterPublish(false);
      return saved;
    }
    this.persisted = true;

    const result = this.sourceJobId
      ? await this.coordinator.updateJobFromDraft(this.sourceJobId, this.draftId, { signal })
      : await this.coordinator.publishDraft(this.draftId, { signal });

    if (signal.aborted) return fail(new CancelledError('submit'));

    this.settleAfterPublish(result.success);
    if (result.success) this.persisted = false;
    return result;
  }

  /**
   * Tear the session down. In-flight results are dropped. An unpublished
   * draft left completely blank is removed from the store; anything else is
   * kept for later.
   */
  async close(): Promise<void> {
    if (this.sessionState === 'discarded') return;

    const published = this.sessionState === 'published';
    this.abort.abort();
    this.sessionState = published ? 'published' : 'discarded';

    if (published || !this.persisted || !this.isEmpty()) return;

    const discarded = await this.coordinator.discardDraft(this.draftId);
    if (!discarded.success) {
      logger.warn(`[${TAG}] Failed to discard empty draft`, {
        draftId: this.draftId,
        error: discarded.error.message,
      });
    }
  }

  toDraft(): JobPostingDraft {
    const v = this.values;
    return {
      id: this.draftId,
      title: v.title,
      description: v.description,
      salaryAmount: toAmount(v.salaryAmount),
      salaryUnit: v.salaryUnit,
      durationAmount: toAmount(v.durationAmount),
      durationUnit: v.durationUnit,
      location: {
        state: v.state,
        district: v.district,
        latitude: v.latitude,
        longitude: v.longitude,
      },
      lastModified: this.savedAt ?? new Date(0).toISOString(),
    };
  }

  private validateAllFields(): void {
    for (const group of FORM_GROUPS) {
      this.applyOutcome(group, this.validateGroup(group));
    }
  }

  private validateGroup(group: JobField): ValidationOutcome {
    const v = this.values;
    switch (group) {
      case 'title':
        return validateField('title', v.title);
      case 'description':
        return validateField('description', v.description);
      case 'salary':
        if (isBlank(v.salaryAmount)) return fieldError('salary', 'This field is required', 'REQUIRED');
        if (!Number.isFinite(Number(v.salaryAmount))) {
          return fieldError('salary', 'Please enter a valid salary amount', 'INVALID_VALUE');
        }
        return validateField('salary', { amount: Number(v.salaryAmount), unit: v.salaryUnit });
      case 'duration':
        if (isBlank(v.durationAmount)) return fieldError('duration', 'This field is required', 'REQUIRED');
        if (!DURATION_PATTERN.test(v.durationAmount.trim())) {
          return fieldError('duration', 'Please enter a valid duration', 'INVALID_VALUE');
        }
        return validateField('duration', { amount: Number(v.durationAmount), unit: v.durationUnit });
      case 'location':
        return validateField('location', {
          state: v.state,
          district: v.district,
          latitude: v.latitude,
          longitude: v.longitude,
        });
      default:
        return { valid: true };
    }
  }

  private applyOutcome(group: JobField, outcome: ValidationOutcome): void {
    if (outcome.valid) {
      this.errors.delete(group);
    } else {
      this.errors.set(group, outcome.errors[0]);
    }
  }

  private computeCost(): CostBreakdown {
    const amount = Number(this.values.salaryAmount);
    const duration = Number(this.values.durationAmount);
    return computeCost(
      Number.isFinite(amount) ? amount : 0,
      this.values.salaryUnit,
      Number.isFinite(duration) ? duration : 0,
      this.values.durationUnit
    );
  }

  private queueAutosave(): void {
    const draft = this.toDraft();
    const revision = this.revision;
    this.saveQueue = this.saveQueue.then(() => this.autosave(draft, revision));
  }

  // Never rejects: autosave problems must not block editing.
  private async autosave(draft: JobPostingDraft, revision: number): Promise<void> {
    const { signal } = this.abort;
    if (signal.aborted) return;

    try {
      const saved = await this.coordinator.saveDraft(draft, { signal });
      if (signal.aborted) return;

      if (!saved.success) {
        logger.warn(`[${TAG}] Autosave failed`, { draftId: draft.id, error: saved.error.message });
        return;
      }

      this.persisted = true;
      this.savedAt = saved.data.lastModified;
      if (revision === this.revision) this.dirty = false;
    } catch (error) {
      logger.warn(`[${TAG}] Autosave threw`, { draftId: draft.id, error: describeError(error) });
    }
  }

  private settleAfterPublish(published: boolean): void {
    if (this.sessionState === 'discarded') return;
    this.sessionState = published ? 'published' : 'editing';
    if (published) this.dirty = false;
  }

  private assertEditing(): void {
    if (this.sessionState !== 'editing') throw new SessionStateError(this.sessionState);
  }

  private isFieldBlank(field: FormField): boolean {
    const value = this.values[field];
    return typeof value === 'string' ? isBlank(value) : value === null;
  }

  private isFormGroup(field: string): field is JobField {
    return FORM_GROUPS.some((group) => group === field);
  }
}
