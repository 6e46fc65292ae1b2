export interface LocationConfig {
  name: string;
  lat: number;
  lon: number;
}

export const CLIMBING_LOCATIONS: readonly LocationConfig[] = [
  { name: 'Farley', lat: 42.5949, lon: -72.3678 },
  { name: 'Rumney', lat: 43.9426, lon: -71.8224 },
  { name: 'Merriam Woods', lat: 43.9948, lon: -71.6828 },
  { name: 'The Gunks', lat: 41.7459, lon: -74.089 },
  { name: 'Hanging Mountain', lat: 42.0618, lon: -73.115 },
];
