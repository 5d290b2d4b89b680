// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

/** Scalar-field element, always in `[0, p)`. Construct through `fr()` or the field ops. */
export type Fr = Brand<bigint, "Fr">;
export type VkId = Brand<string, "VkId">;

export const asFr = (n: bigint): Fr => n as Fr;
export const asVkId = (s: string): VkId => s as VkId;
