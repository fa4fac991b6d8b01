export const createExtensionsSQL = `
CREATE EXTENSION IF NOT EXISTS pgcrypto;
`;

export const createTablesSQL = `
CREATE TABLE IF NOT EXISTS trips (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  destination TEXT NOT NULL,
  start_date DATE,
  end_date DATE,
  duration INT NOT NULL DEFAULT 1,
  travel_style TEXT NOT NULL DEFAULT 'leisure',
  transportation TEXT NOT NULL DEFAULT 'flight',
  travelers JSONB NOT NULL DEFAULT '[]'::jsonb,
  activities JSONB NOT NULL DEFAULT '[]'::jsonb,
  weather_conditions JSONB,
  created_at TIMESTAMPTZ DEFAULT now(),
  updated_at TIMESTAMPTZ DEFAULT now()
);

CREATE TABLE IF NOT EXISTS packing_items (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  trip_id UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  category TEXT NOT NULL DEFAULT 'other',
  quantity INT NOT NULL DEFAULT 1,
  is_packed BOOLEAN NOT NULL DEFAULT false,
  is_essential BOOLEAN NOT NULL DEFAULT false,
  ai_suggested BOOLEAN NOT NULL DEFAULT false,
  display_order INT NOT NULL DEFAULT 0,
  created_at TIMESTAMPTZ DEFAULT now()
);
`;

export const createIndexesSQL = `
CREATE INDEX IF NOT EXISTS idx_trip_destination_date ON trips (destination, start_date);
CREATE INDEX IF NOT EXISTS idx_trip_created_desc ON trips (created_at DESC);
CREATE INDEX IF NOT EXISTS idx_item_trip_category ON packing_items (trip_id, category);
CREATE INDEX IF NOT EXISTS idx_item_trip_packed ON packing_items (trip_id, is_packed);
`;
