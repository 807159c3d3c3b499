// Database Models

export interface CountryRow {
  id: string;
  code: string;
  name: string;
  is_staff: boolean;
  participants_ok: boolean;
  contact_email: string | null;
  contact_extra: string[]; // jsonb
  expected_leaders: number;
  expected_deputies: number;
  expected_contestants: number;
  expected_observers_a: number;
  expected_observers_b: number;
  expected_observers_c: number;
  expected_single_rooms: number;
  numbers_confirmed: boolean;
  generic_url: string | null;
  flag_id: string | null;
  leader_email: string | null;
  physical_address: string | null;
  retired: boolean;
  created_at: string;
  updated_at: string;
}

export interface PersonRow {
  id: string;
  country_id: string;
  primary_role: string;
  other_roles: string[]; // jsonb
  guide_for: string[]; // jsonb, country ids
  given_name: string;
  family_name: string;
  passport_given_name: string | null;
  passport_family_name: string | null;
  gender: string | null;
  date_of_birth: string | null; // yyyy-mm-dd, kept as text
  languages: string[]; // jsonb
  diet: string | null;
  tshirt: string | null;
  arrival_place: string | null;
  arrival_date: string | null;
  arrival_hour: string | null;
  arrival_minute: string | null;
  arrival_flight: string | null;
  departure_place: string | null;
  departure_date: string | null;
  departure_hour: string | null;
  departure_minute: string | null;
  departure_flight: string | null;
  room_type: string | null;
  room_share_with: string | null;
  room_number: string | null;
  phone_number: string | null;
  passport_number: string | null;
  nationality: string | null;
  incomplete: boolean;
  photo_id: string | null;
  consent_form_id: string | null;
  event_photos_consent: boolean | null;
  photo_consent: 'none' | 'badge_only' | 'yes' | null;
  diet_consent: boolean | null;
  generic_url: string | null;
  retired: boolean;
  created_at: string;
  updated_at: string;
}

export interface FileRow {
  id: string;
  kind: 'photo' | 'flag' | 'consent_form';
  owner_kind: 'country' | 'person';
  owner_id: string;
  format: 'png' | 'jpeg' | 'pdf';
  filename: string;
  storage_key: string;
  created_at: string;
}

export interface ScoreRow {
  person_id: string;
  problem: number;
  score: number;
}

/**
 * Single row (id = 1). Every update bumps version.
 */
export interface EventStateRow {
  id: number;
  version: number;
  registration_enabled: boolean;
  preregistration_enabled: boolean;
  self_scoring_enabled: boolean;
  gold: number | null;
  silver: number | null;
  bronze: number | null;
  updated_at: string;
}

export interface AccountRow {
  username: string;
  password_hash: string; // argon2
  country_id: string;
  person_id: string | null; // set for self-registration accounts
  retired: boolean;
  created_at: string;
}
