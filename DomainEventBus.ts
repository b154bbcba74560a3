/**
 * Domain Event Bus
 *
 * Ordered, synchronous dispatch of domain events to registered handlers.
 * Handlers run in registration order before publish returns; every
 * published event is appended to an in-memory log.
 */

import { ILogger } from './utils/ILogger';
import { ContributionResourceType, InspectionStatus, RegistrableUserType } from './types';

export interface DomainEventMap {
  UserRegistered: {
    account: string;
    userType: RegistrableUserType;
    inviter: string | null;
  };
  UserDenied: {
    account: string;
    userType: RegistrableUserType;
  };
  InspectionRealized: {
    inspectionId: number;
    regenerator: string;
    inspector: string;
    score: number;
    era: number;
  };
  InspectionExpired: {
    inspectionId: number;
    regenerator: string;
    inspector: string;
  };
  InspectionInvalidated: {
    inspectionId: number;
    regenerator: string;
    /** null when the inspection was still open */
    inspector: string | null;
    previousStatus: InspectionStatus;
    score: number;
    era: number;
  };
  ResourceInvalidated: {
    resourceType: ContributionResourceType;
    id: number;
    creator: string;
    era: number;
  };
}

export type DomainEventType = keyof DomainEventMap;

export interface DomainEvent<K extends DomainEventType = DomainEventType> {
  sequence: number;
  type: K;
  block: number;
  payload: DomainEventMap[K];
}

export type DomainEventHandler<K extends DomainEventType> = (payload: DomainEventMap[K], block: number) => void;

interface RegisteredHandler<K extends DomainEventType> {
  name: string;
  handle: DomainEventHandler<K>;
}

type HandlerTable = { [K in DomainEventType]: Array<RegisteredHandler<K>> };

export class DomainEventBus {
  private logger: ILogger;
  private handlers: HandlerTable = {
    UserRegistered: [],
    UserDenied: [],
    InspectionRealized: [],
    InspectionExpired: [],
    InspectionInvalidated: [],
    ResourceInvalidated: [],
  };
  private log: DomainEvent[] = [];
  private sequence = 0;

  constructor(logger: ILogger) {
    this.logger = logger;
  }

  subscribe<K extends DomainEventType>(type: K, name: string, handle: DomainEventHandler<K>): void {
    const registered: RegisteredHandler<K> = { name, handle };
    this.handlers[type].push(registered);
    this.logger.debug('Handler subscribed', { type, name });
  }

  /**
   * Dispatch to every handler of `type`, in order. A handler error
   * propagates to the publisher.
   */
  publish<K extends DomainEventType>(type: K, payload: DomainEventMap[K], block: number): DomainEvent<K> {
    this.sequence += 1;
    const event: DomainEvent<K> = { sequence: this.sequence, type, block, payload };
    this.log.push(event);

    for (const handler of this.handlers[type]) {
      try {
        handler.handle(payload, block);
      } catch (error) {
        this.logger.error('Domain event handler failed', {
          type,
          handler: handler.name,
          sequence: event.sequence,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }

    return event;
  }

  handlerNames(type: DomainEventType): string[] {
    return this.handlers[type].map((handler) => handler.name);
  }

  getEvents(type?: DomainEventType): DomainEvent[] {
    return type ? this.log.filter((event) => event.type === type) : [...this.log];
  }
}
