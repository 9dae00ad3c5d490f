/**
 * City-related types
 */

export interface City {
  id: string;
  name: string;
  /** Opaque token that scopes requests to this city (e.g. a header value) */
  regionContext: string;
}

export interface RawCityRecord {
  id?: string | number | null;
  name?: string | null;
  regionContext?: string | null;
}

/** Entry of the available-cities list */
export interface CityEntry {
  id: string;
  name: string;
}
