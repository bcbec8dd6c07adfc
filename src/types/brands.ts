// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type MessageId = Brand<`0x${string}`, "MessageId">;
export type TransportId = Brand<`0x${string}`, "TransportId">;

export const asMessageId = (h: `0x${string}`): MessageId => h as MessageId;
export const asTransportId = (h: `0x${string}`): TransportId => h as TransportId;
