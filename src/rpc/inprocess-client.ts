import { ParleyCoreRuntime, type RuntimeEvent, type RuntimeInitOptions } from "../core/runtime.js";
import { RpcRouter } from "./router.js";
import {
  JSON_RPC_ERROR,
  buildRpcMethodError,
  isRpcMethodError,
  type JsonRpcRequest,
} from "./protocol.js";

export class InProcessRpcClient {
  private readonly runtime: ParleyCoreRuntime;
  private readonly router: RpcRouter;
  private nextRequestId = 1;

  constructor(runtime: ParleyCoreRuntime) {
    this.runtime = runtime;
    this.router = new RpcRouter(runtime);
  }

  onEvent(listener: (event: RuntimeEvent) => void): () => void {
    return this.runtime.onEvent(listener);
  }

  async call<T>(method: string, params?: unknown): Promise<T> {
    const request: JsonRpcRequest = {
      jsonrpc: "2.0",
      id: this.nextRequestId++,
      method,
      params,
    };

    try {
      const result = await this.router.dispatch(request);
      return result as T;
    } catch (error) {
      if (isRpcMethodError(error)) {
        throw error;
      }
      throw buildRpcMethodError(
        JSON_RPC_ERROR.INTERNAL_ERROR,
        error instanceof Error ? error.message : String(error),
        {
          reason: "internal_error",
        },
      );
    }
  }
}

export async function createInProcessRpcClient(options: RuntimeInitOptions = {}): Promise<InProcessRpcClient> {
  const runtime = await ParleyCoreRuntime.create(options);
  return new InProcessRpcClient(runtime);
}
