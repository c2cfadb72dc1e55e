/**
 * Domain events and an in-process dispatcher.
 *
 * Schema (discriminated on `kind`, timestamps are ISO-8601):
 *
 * | kind                  | emitted by                         | payload                                              |
 * |-----------------------|------------------------------------|------------------------------------------------------|
 * | `material_uploaded`   | material upload registration       | materialId, userId                                   |
 * | `exam_completed`      | attempt completion (once per attempt) | attemptId, userId, score                          |
 * | `ai_feedback_created` | feedback submission                | feedbackId, sessionId, userId, rating, aiLowConfidence, contextChunkIds |
 *
 * Handlers must tolerate redelivery: the same event may be published again
 * after a crash or by an operator replay.
 */

import { errorMessage } from "@/lib/errors";

export type MaterialUploadedEvent = {
  kind: "material_uploaded";
  materialId: string;
  userId: string;
  occurredAt: string;
};

export type ExamCompletedEvent = {
  kind: "exam_completed";
  attemptId: string;
  userId: string;
  score: number;
  occurredAt: string;
};

export type AiFeedbackCreatedEvent = {
  kind: "ai_feedback_created";
  feedbackId: string;
  sessionId: string;
  userId: string;
  rating: number;
  aiLowConfidence: boolean;
  contextChunkIds: string[];
  occurredAt: string;
};

export type DomainEvent = MaterialUploadedEvent | ExamCompletedEvent | AiFeedbackCreatedEvent;

export type DomainEventKind = DomainEvent["kind"];

export type EventOfKind<K extends DomainEventKind> = Extract<DomainEvent, { kind: K }>;

export type EventHandler<K extends DomainEventKind> = (event: EventOfKind<K>) => Promise<void>;

export type HandlerFailure = {
  kind: DomainEventKind;
  handler: string;
  message: string;
};

export type PublishResult = {
  delivered: number;
  failures: HandlerFailure[];
};

export type EventBus = {
  subscribe<K extends DomainEventKind>(kind: K, name: string, handler: EventHandler<K>): () => void;
  publish(event: DomainEvent): Promise<PublishResult>;
};

type Subscription<E> = {
  name: string;
  handler: (event: E) => Promise<void>;
};

type SubscriptionTable = { [K in DomainEventKind]: Array<Subscription<EventOfKind<K>>> };

async function deliver<E extends DomainEvent>(targets: Array<Subscription<E>>, event: E): Promise<PublishResult> {
  const settled = await Promise.allSettled(targets.map((target) => target.handler(event)));

  const failures: HandlerFailure[] = [];
  settled.forEach((result, index) => {
    if (result.status === "rejected") {
      const failure = {
        kind: event.kind,
        handler: targets[index]?.name ?? "unknown",
        message: errorMessage(result.reason),
      };
      console.error("[events] handler failed", { ...failure, event });
      failures.push(failure);
    }
  });

  return { delivered: targets.length - failures.length, failures };
}

export function createEventBus(): EventBus {
  const table: SubscriptionTable = {
    material_uploaded: [],
    exam_completed: [],
    ai_feedback_created: [],
  };

  return {
    subscribe(kind, name, handler) {
      const subscription = { name, handler };
      table[kind].push(subscription);

      return () => {
        const index = table[kind].indexOf(subscription);
        if (index >= 0) {
          table[kind].splice(index, 1);
        }
      };
    },

    publish(event) {
      switch (event.kind) {
        case "material_uploaded":
          return deliver([...table.material_uploaded], event);
        case "exam_completed":
          return deliver([...table.exam_completed], event);
        case "ai_feedback_created":
          return deliver([...table.ai_feedback_created], event);
      }
    },
  };
}
