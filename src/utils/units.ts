export const KPH_TO_MPH = 0.621371;

export function kphToMph(kph: number): number {
  return kph * KPH_TO_MPH;
}
