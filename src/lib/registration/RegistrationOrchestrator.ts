/**
 * Registration Orchestrator
 *
 * Registers one device through the fixed, dependency-ordered sequence:
 *
 * 1. POST /edev                                  EndDevice         -> 201 + /edev/{edevID}
 * 2. PUT  /edev/{edevID}/di                      DeviceInformation -> 200
 * 3. POST /edev/{edevID}/der                     DER               -> 201 + .../der/{derID}
 * 4. PUT  /edev/{edevID}/der/{derID}/dercap      DERCapability     -> 200
 * 5. PUT  /edev/{edevID}/cp                      ConnectionPoint   -> 200
 *
 * All five documents are built and validated before the first request.
 * A step runs only after the step that yields its identifier is confirmed.
 * Any failure halts the run; resources already created stay on the server
 * and are reported in RegistrationError.completed.
 *
 * A run may resume from a ResumePoint: the EndDevice (and the DER, when the
 * point lies past DERCreated) are reused, and only the remaining steps run.
 *
 * @license Apache-2.0
 */

import {
  ProtocolError,
  RegistrationError,
  ValidationError,
  isRegistrationFailure,
} from '../errors';
import type { CompletedResources, RegistrationFailure } from '../errors';
import { defaultLogger } from '../logger';
import type { Logger } from '../logger';
import { serializeResource } from '../model/documentCodec';
import {
  buildConnectionPoint,
  buildDer,
  buildDerCapability,
  buildDeviceInformation,
  buildEndDevice,
} from '../model/resources';
import type { ResourceName } from '../model/types';
import { extractResourceId } from '../transport/Transport';
import type { HttpMethod, Transport, TransportResponse } from '../transport/Transport';
import { stageIndex } from './types';
import type {
  BatchOptions,
  BatchOutcome,
  DeviceSpec,
  RegisterDeviceOptions,
  RegistrationResult,
  RegistrationStage,
  ResumePoint,
} from './types';

export interface RegistrationOrchestratorOptions {
  /** Timeout applied to every request of a run */
  timeoutMs?: number;
  logger?: Logger;
}

/** The five serialized documents of one run */
interface PreparedDocuments {
  lFDI: string;
  sFDI: string;
  endDevice: string;
  deviceInformation: string;
  der: string;
  derCapability: string;
  connectionPoint: string;
}

interface StepRequest {
  stage: RegistrationStage;
  resource: ResourceName;
  method: HttpMethod;
  path: string;
  body: string;
}

/** Report a ValidationError at the stage its resource belongs to */
function atStage<T>(stage: RegistrationStage, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new RegistrationError(stage, error);
    }
    throw error;
  }
}

/**
 * Build and serialize every document up front, so that invalid input fails
 * before anything has been sent
 */
function prepareDocuments(spec: DeviceSpec): PreparedDocuments {
  const endDevice = atStage('EndDeviceCreated', () => buildEndDevice({ ...spec.endDevice, lFDI: spec.lFDI }));

  return {
    lFDI: endDevice.lFDI,
    sFDI: endDevice.sFDI,
    endDevice: atStage('EndDeviceCreated', () => serializeResource('EndDevice', endDevice)),
    deviceInformation: atStage('DeviceInformationSet', () =>
      serializeResource('DeviceInformation', buildDeviceInformation(endDevice.lFDI, spec.deviceInformation))
    ),
    der: atStage('DERCreated', () => serializeResource('DER', buildDer())),
    derCapability: atStage('DERCapabilitySet', () =>
      serializeResource('DERCapability', buildDerCapability(spec.derCapability))
    ),
    connectionPoint: atStage('ConnectionPointSet', () =>
      serializeResource('ConnectionPoint', buildConnectionPoint(spec.connectionPoint))
    ),
  };
}

/**
 * Ids a resumed run starts from
 *
 * @throws RegistrationError if the point names a stage that cannot be resumed
 */
function resumedResources(resume: ResumePoint): CompletedResources {
  const index = stageIndex(resume.stage);
  const invalid = (message: string) =>
    new RegistrationError(resume.stage, new ValidationError(message, 'resume'), {
      endDeviceID: resume.endDeviceID || undefined,
      derID: resume.derID,
    });

  if (!resume.endDeviceID) {
    throw invalid('an EndDevice id is required');
  }
  if (index < stageIndex('DeviceInformationSet') || index > stageIndex('ConnectionPointSet')) {
    throw invalid(`cannot resume at ${resume.stage}`);
  }
  if (index > stageIndex('DERCreated')) {
    if (!resume.derID) {
      throw invalid(`resuming at ${resume.stage} requires a DER id`);
    }
    return { endDeviceID: resume.endDeviceID, derID: resume.derID };
  }
  return { endDeviceID: resume.endDeviceID };
}

/**
 * Drives registrations over a shared transport. Per-run state lives in each
 * call, so several registrations may run concurrently on one instance.
 */
export class RegistrationOrchestrator {
  private timeoutMs?: number;
  private logger: Logger;

  constructor(
    private transport: Transport,
    options: RegistrationOrchestratorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Register one device
   *
   * @throws RegistrationError naming the stage that failed
   */
  async registerEndDevice(spec: DeviceSpec, options: RegisterDeviceOptions = {}): Promise<RegistrationResult> {
    const documents = prepareDocuments(spec);
    const { lFDI, sFDI } = documents;
    const { resume } = options;
    const completed: CompletedResources = resume ? resumedResources(resume) : {};
    const firstStage = resume ? stageIndex(resume.stage) : stageIndex('EndDeviceCreated');
    const pending = (stage: RegistrationStage) => stageIndex(stage) >= firstStage;

    const confirm = (stage: RegistrationStage) => {
      this.logger.info(`[${lFDI}] ${stage}`);
      options.onStage?.(stage, lFDI);
    };

    if (resume) {
      this.logger.info(`[${lFDI}] resuming at ${resume.stage} on /edev/${resume.endDeviceID}`);
    }

    let endDeviceID = completed.endDeviceID;
    if (endDeviceID === undefined) {
      endDeviceID = await this.create(
        { stage: 'EndDeviceCreated', resource: 'EndDevice', method: 'POST', path: '/edev', body: documents.endDevice },
        completed
      );
      completed.endDeviceID = endDeviceID;
      confirm('EndDeviceCreated');
    }

    const edevPath = `/edev/${endDeviceID}`;

    if (pending('DeviceInformationSet')) {
      await this.update(
        {
          stage: 'DeviceInformationSet',
          resource: 'DeviceInformation',
          method: 'PUT',
          path: `${edevPath}/di`,
          body: documents.deviceInformation,
        },
        completed
      );
      confirm('DeviceInformationSet');
    }

    let derID = completed.derID;
    if (derID === undefined) {
      derID = await this.create(
        { stage: 'DERCreated', resource: 'DER', method: 'POST', path: `${edevPath}/der`, body: documents.der },
        completed
      );
      completed.derID = derID;
      confirm('DERCreated');
    }

    if (pending('DERCapabilitySet')) {
      await this.update(
        {
          stage: 'DERCapabilitySet',
          resource: 'DERCapability',
          method: 'PUT',
          path: `${edevPath}/der/${derID}/dercap`,
          body: documents.derCapability,
        },
        completed
      );
      confirm('DERCapabilitySet');
    }

    await this.update(
      {
        stage: 'ConnectionPointSet',
        resource: 'ConnectionPoint',
        method: 'PUT',
        path: `${edevPath}/cp`,
        body: documents.connectionPoint,
      },
      completed
    );
    confirm('ConnectionPointSet');
    confirm('Complete');

    return { endDeviceID, derID, lFDI, sFDI };
  }

  /**
   * Register devices one after another
   *
   * With abortOnError (default), the devices after the first failure are
   * reported as skipped and never sent.
   */
  async registerEndDevices(specs: readonly DeviceSpec[], options: BatchOptions = {}): Promise<BatchOutcome[]> {
    const abortOnError = options.abortOnError ?? true;
    const outcomes: BatchOutcome[] = [];
    let aborted = false;

    for (const spec of specs) {
      if (aborted) {
        outcomes.push({ lFDI: spec.lFDI, status: 'skipped' });
        continue;
      }

      try {
        const result = await this.registerEndDevice(spec, options);
        outcomes.push({ lFDI: result.lFDI, status: 'complete', result });
      } catch (error) {
        if (!(error instanceof RegistrationError)) throw error;
        this.logger.error(`[${spec.lFDI}] ${error.message}`);
        outcomes.push({ lFDI: spec.lFDI, status: 'failed', error });
        aborted = abortOnError;
      }
    }

    return outcomes;
  }

  /** POST step: expects 201 and a location under the collection */
  private async create(step: StepRequest, completed: CompletedResources): Promise<string> {
    const response = await this.dispatch(step, completed);

    if (response.statusCode !== 201) {
      throw this.fail(step, completed, this.unexpectedStatus(step, response.statusCode, 201, response.body));
    }

    const id = extractResourceId(response.headers.location, step.path);
    if (id === undefined) {
      const location = response.headers.location ?? '(none)';
      throw this.fail(
        step,
        completed,
        new ProtocolError(
          `${step.resource} created but location "${location}" is not under ${step.path}`,
          response.statusCode,
          201,
          response.body
        )
      );
    }
    return id;
  }

  /** PUT step: expects 200 */
  private async update(step: StepRequest, completed: CompletedResources): Promise<void> {
    const response = await this.dispatch(step, completed);

    if (response.statusCode !== 200) {
      throw this.fail(step, completed, this.unexpectedStatus(step, response.statusCode, 200, response.body));
    }
  }

  private async dispatch(step: StepRequest, completed: CompletedResources): Promise<TransportResponse> {
    try {
      return await this.transport.send({
        method: step.method,
        path: step.path,
        body: step.body,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (isRegistrationFailure(error)) {
        throw this.fail(step, completed, error);
      }
      throw error;
    }
  }

  private unexpectedStatus(step: StepRequest, actual: number, expected: number, body: string): ProtocolError {
    return new ProtocolError(
      `${step.method} ${step.path} returned ${actual}, expected ${expected}`,
      actual,
      expected,
      body
    );
  }

  private fail(step: StepRequest, completed: CompletedResources, cause: RegistrationFailure): RegistrationError {
    return new RegistrationError(step.stage, cause, { ...completed });
  }
}
