// The mgrs package ships no type declarations.
declare module "mgrs" {
  type LonLat = [longitude: number, latitude: number];

  export function forward(lonLat: LonLat, accuracy?: number): string;
  export function toPoint(reference: string): LonLat;

  const mgrs: {
    forward: typeof forward;
    toPoint: typeof toPoint;
  };
  export default mgrs;
}
