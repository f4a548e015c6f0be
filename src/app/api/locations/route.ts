import { NextResponse } from 'next/server';

import { REGIONS, locationsForRegion } from '@/lib/duty/locations';

export const runtime = 'nodejs';

export async function GET() {
  const regions = REGIONS.map((region) => ({
    ...region,
    locations: locationsForRegion(region.id),
  }));
  return NextResponse.json({ regions });
}
