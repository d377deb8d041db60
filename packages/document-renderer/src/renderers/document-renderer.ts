import type { LoggerMethods } from '@quillkit/logger';
import type {
  AppliedProperties,
  DocumentKind,
  PreferenceValue,
  PropertyScope,
  StageFailure,
  WorkflowStage,
} from '@quillkit/model';

import type { FormattingPlan } from '../plan/formatting-plan';
import type { DocumentContent } from '../plan/text-splitter';

import { PropertyValueError } from '../errors/property-value-error';
import {
  getPropertyDefinition,
  getPropertyRegistry,
} from '../registry/property-registry';

/**
 * Everything a renderer needs to write one document
 */
export interface RenderJob {
  /**
   * Reserved output path; the renderer overwrites it
   */
  path: string;
  content: DocumentContent;
  plan: FormattingPlan;
}

export interface RendererOutput {
  appliedProperties: AppliedProperties;
  propertyFailures: StageFailure[];
}

export interface DocumentRenderer {
  readonly kind: DocumentKind;
  render(job: RenderJob): Promise<RendererOutput>;
}

/**
 * Typed setter for one property. Throws PropertyValueError when the value
 * cannot be applied.
 */
export type PropertySetter<TTarget> = (
  target: TTarget,
  value: PreferenceValue,
  property: string,
) => void;

export type SetterTable<TTarget> = Readonly<
  Record<string, PropertySetter<TTarget>>
>;

export function renderStageOf(kind: DocumentKind): WorkflowStage {
  return kind === 'pdf' ? 'render-pdf' : 'render-word';
}

/**
 * Applies plan values through setter tables for one render, recording what
 * was applied and which values were rejected.
 *
 * A rejected value falls back to the registry default when there is one.
 */
export class PropertyApplier {
  private readonly applied: AppliedProperties = {
    body: {},
    title: {},
    page: {},
  };
  private readonly failures: StageFailure[] = [];

  constructor(
    private readonly logger: LoggerMethods,
    private readonly componentName: string,
    private readonly kind: DocumentKind,
  ) {}

  apply<TTarget>(
    scope: PropertyScope,
    setters: SetterTable<TTarget>,
    target: TTarget,
    values: Readonly<Record<string, PreferenceValue>>,
  ): void {
    for (const [property, value] of Object.entries(values)) {
      const setter = Object.hasOwn(setters, property)
        ? setters[property]
        : undefined;

      if (!setter) {
        this.recordFailure(
          scope,
          property,
          `No setter for ${scope}.${property}`,
        );
        continue;
      }

      try {
        setter(target, value, property);
        this.applied[scope][property] = value;
        this.logger.debug(
          `[${this.componentName}] Applied ${scope}.${property} = ${String(value)}`,
        );
      } catch (error) {
        if (!(error instanceof PropertyValueError)) {
          throw error;
        }
        this.recordFailure(scope, property, error.message, error);
        this.applyDefault(scope, setters, target, property);
      }
    }
  }

  result(): RendererOutput {
    return {
      appliedProperties: this.applied,
      propertyFailures: this.failures,
    };
  }

  private applyDefault<TTarget>(
    scope: PropertyScope,
    setters: SetterTable<TTarget>,
    target: TTarget,
    property: string,
  ): void {
    const fallback = getPropertyDefinition(
      getPropertyRegistry(this.kind),
      scope,
      property,
    )?.default;
    if (fallback === undefined) return;

    setters[property](target, fallback, property);
    this.applied[scope][property] = fallback;
  }

  private recordFailure(
    scope: PropertyScope,
    property: string,
    message: string,
    cause?: unknown,
  ): void {
    this.logger.warn(
      `[${this.componentName}] Skipped ${scope}.${property}: ${message}`,
    );
    this.failures.push({
      kind: 'PropertyApplicationFailure',
      stage: renderStageOf(this.kind),
      message,
      scope,
      property,
      cause,
    });
  }
}
