declare const brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [brand]: B };

export type SessionKey = Brand<string, "SessionKey">;

export const SessionKey = {
  make: (value: string): SessionKey => value as SessionKey,
};
