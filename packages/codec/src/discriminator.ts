/**
 * Open discriminator sets.
 *
 * An interface has a fixed list of standard discriminators and accepts any
 * other string registered by an extension module. `OpenDiscriminator` keeps
 * editor completion for the standard values while still admitting strings.
 */

export type OpenDiscriminator<S extends string> = S | (string & {});

export interface DiscriminatorSet<S extends string> {
  readonly interfaceName: string;
  readonly standard: ReadonlyArray<S>;
  isStandard(value: string): value is S;
}

export function discriminatorSet<const S extends string>(
  interfaceName: string,
  standard: ReadonlyArray<S>
): DiscriminatorSet<S> {
  const known = new Set<string>(standard);
  return {
    interfaceName,
    standard,
    isStandard: (value: string): value is S => known.has(value),
  };
}
