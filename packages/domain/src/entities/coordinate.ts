/** WGS84 position in decimal degrees */
export interface Coordinate {
  readonly lat: number; // [-90, 90]
  readonly lng: number; // [-180, 180]
}
