import {
  SageMakerRuntimeClient,
  SageMakerRuntimeServiceException,
  InvokeEndpointCommand,
  InvokeEndpointWithResponseStreamCommand,
  ModelError as SdkModelError,
  ModelStreamError as SdkModelStreamError,
} from '@aws-sdk/client-sagemaker-runtime';
import type { ResponseStream } from '@aws-sdk/client-sagemaker-runtime';
import type { SageMakerBackendConfig } from '../types/config.types.js';
import type { BackendPayload, InvokeOptions } from '../types/backend.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { GatewayError } from '../errors/base.js';
import { BackendError, ConfigurationError, ModelError } from '../errors/backend.js';

export type SageMakerRuntime = Pick<SageMakerRuntimeClient, 'send'>;

export interface SageMakerBackendOptions {
  /** Builds the runtime client on first use. Defaults to the AWS SDK client. */
  createClient?: (region: string) => SageMakerRuntime;
}

function toBackendFailure(error: unknown): unknown {
  if (error instanceof GatewayError) return error;
  if (error instanceof SdkModelError) {
    return new ModelError(error.message, error.OriginalStatusCode, error);
  }
  if (error instanceof SdkModelStreamError) {
    return new ModelError(error.message, undefined, error);
  }
  if (error instanceof SageMakerRuntimeServiceException) {
    return new BackendError(error.message, error.$metadata.httpStatusCode, error);
  }
  return error;
}

async function* payloadParts(
  body: AsyncIterable<ResponseStream>,
  controller: AbortController,
  detach: () => void,
): AsyncGenerator<Uint8Array, void, undefined> {
  try {
    for await (const event of body) {
      if (event.PayloadPart?.Bytes) {
        yield event.PayloadPart.Bytes;
      } else if (event.ModelStreamError) {
        throw new ModelError(event.ModelStreamError.message, undefined, event.ModelStreamError);
      } else if (event.InternalStreamFailure) {
        throw new BackendError(event.InternalStreamFailure.message, undefined, event.InternalStreamFailure);
      }
    }
  } catch (error) {
    throw toBackendFailure(error);
  } finally {
    // Closes the HTTP/2 event stream whether the consumer finished, failed or stopped early.
    detach();
    controller.abort();
  }
}

export class SageMakerBackend implements InferenceBackend {
  readonly modelId: string;
  private readonly region: string;
  private readonly createClient: (region: string) => SageMakerRuntime;
  private clientHandle: SageMakerRuntime | undefined;

  constructor(config: SageMakerBackendConfig, options: SageMakerBackendOptions = {}) {
    this.modelId = config.endpointName;
    this.region = config.region;
    this.createClient = options.createClient ?? ((region) => new SageMakerRuntimeClient({ region }));
  }

  /** Created once, on first use, then shared by every invocation. */
  private get client(): SageMakerRuntime {
    this.clientHandle ??= this.createClient(this.region);
    return this.clientHandle;
  }

  private endpointName(): string {
    if (!this.modelId) {
      throw new ConfigurationError('SAGEMAKER_ENDPOINT_NAME not configured');
    }
    return this.modelId;
  }

  async invoke(payload: BackendPayload, options: InvokeOptions = {}): Promise<string> {
    const command = new InvokeEndpointCommand({
      EndpointName: this.endpointName(),
      ContentType: 'application/json',
      Accept: 'application/json',
      Body: JSON.stringify(payload),
    });

    try {
      const response = await this.client.send(command, { abortSignal: options.signal });
      return response.Body ? response.Body.transformToString() : '';
    } catch (error) {
      throw toBackendFailure(error);
    }
  }

  async openStream(
    payload: BackendPayload,
    options: InvokeOptions = {},
  ): Promise<AsyncIterable<Uint8Array>> {
    const command = new InvokeEndpointWithResponseStreamCommand({
      EndpointName: this.endpointName(),
      ContentType: 'application/json',
      Body: JSON.stringify(payload),
    });

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    const detach = (): void => options.signal?.removeEventListener('abort', forwardAbort);

    try {
      const response = await this.client.send(command, { abortSignal: controller.signal });
      if (!response.Body) {
        throw new BackendError('No response body for stream');
      }
      return payloadParts(response.Body, controller, detach);
    } catch (error) {
      detach();
      controller.abort();
      throw toBackendFailure(error);
    }
  }
}
