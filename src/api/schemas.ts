import { Type } from '@sinclair/typebox';

export const Amount = Type.Union([
  Type.String({ minLength: 1, maxLength: 64 }),
  Type.Number({ exclusiveMinimum: 0, maximum: 1e15 }),
]);

export const SubjectIdParam = Type.Object({
  subjectId: Type.String({ minLength: 1, maxLength: 128 }),
});

export const ParticipantIdParam = Type.Object({
  participantId: Type.String({ minLength: 1, maxLength: 128 }),
});

export const ClaimKindParam = Type.Object({
  kind: Type.Union([Type.Literal('commission'), Type.Literal('proceeds')]),
});

export const EventsQuery = Type.Object({
  since: Type.Optional(Type.Integer({ minimum: 0 })),
});

export const BidBody = Type.Object({
  amount: Amount,
});

export const DepositBody = Type.Object({
  amount: Amount,
  txId: Type.Optional(Type.String({ minLength: 1, maxLength: 128 })),
});
