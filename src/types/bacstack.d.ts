// Type declarations for the parts of bacstack the bridge uses.
// bacstack ships no typings and has no @types package.

declare module 'bacstack' {
  import { EventEmitter } from 'events';

  namespace Client {
    interface ObjectId {
      type: number;
      instance: number;
    }

    interface TaggedValue {
      type: number;
      value: unknown;
    }

    /**
     * Datalink the client sends and receives through.
     * Emits 'message' (buffer, address) and 'error' (error).
     */
    interface Transport extends EventEmitter {
      getBroadcastAddress(): string;
      getMaxPayload(): number;
      send(buffer: Buffer, offset: number, receiver: string): void;
      open(): void;
      close(): void;
    }

    interface ClientOptions {
      port?: number;
      interface?: string;
      transport?: Transport;
      broadcastAddress?: string;
      apduTimeout?: number;
    }

    interface WhoIsOptions {
      lowLimit?: number;
      highLimit?: number;
      address?: string;
    }

    interface WhoIsRequest {
      address: string;
      lowLimit?: number;
      highLimit?: number;
    }

    interface ReadPropertyOptions {
      maxSegments?: number;
      maxApdu?: number;
      invokeId?: number;
      arrayIndex?: number;
    }

    interface WritePropertyOptions extends ReadPropertyOptions {
      priority?: number;
    }

    interface ReadPropertyResult {
      len: number;
      objectId: ObjectId;
      property: { id: number; index: number };
      values: TaggedValue[];
    }

    interface IAmMessage {
      address: string;
      deviceId: number;
      maxApdu: number;
      segmentation: number;
      vendorId: number;
    }
  }

  class Client extends EventEmitter {
    constructor(options?: Client.ClientOptions);

    whoIs(options?: Client.WhoIsOptions): void;

    readProperty(
      address: string,
      objectId: Client.ObjectId,
      propertyId: number,
      options: Client.ReadPropertyOptions,
      next: (error: Error | null, value?: Client.ReadPropertyResult) => void
    ): void;

    writeProperty(
      address: string,
      objectId: Client.ObjectId,
      propertyId: number,
      values: Client.TaggedValue[],
      options: Client.WritePropertyOptions,
      next: (error: Error | null) => void
    ): void;

    iAmResponse(deviceId: number, segmentation: number, vendorId: number): void;

    close(): void;

    on(event: 'iAm', listener: (message: Client.IAmMessage) => void): this;
    on(event: 'whoIs', listener: (request: Client.WhoIsRequest) => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
  }

  export = Client;
}
