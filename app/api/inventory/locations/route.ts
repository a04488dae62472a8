import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { authorizeApiRequest, clientIp, handleRouteError, jsonError } from '@/lib/api';
import { Capability } from '@/lib/constants/enums';
import { getPool } from '@/lib/db';
import { addLocation, listActiveLocationNames, listLocations } from '@/lib/inventory/config';
import { failureStatus } from '@/lib/inventory/responses';

const createSchema = z.object({
  location_name: z.string().max(255),
});

// GET /api/inventory/locations - All locations, inactive included
export async function GET(req: NextRequest) {
  try {
    const authz = await authorizeApiRequest(req, Capability.EDIT_INVENTORY);
    if (!authz.ok) return authz.response;

    const locations = await listLocations(getPool());
    return NextResponse.json({ success: true, message: '', locations });
  } catch (error) {
    return handleRouteError(error, 'fetch inventory locations');
  }
}

// POST /api/inventory/locations - Add a location
export async function POST(req: NextRequest) {
  try {
    const authz = await authorizeApiRequest(req, Capability.EDIT_INVENTORY, { csrf: true });
    if (!authz.ok) return authz.response;

    const body = createSchema.parse(await req.json());
    const db = getPool();
    const result = await addLocation(db, body.location_name, {
      userId: authz.userId,
      ipAddress: clientIp(req.headers),
    });
    if (!result.success) {
      return jsonError(result.message, failureStatus(result.reason));
    }

    return NextResponse.json(
      {
        success: true,
        message: result.message,
        location: result.data.name,
        location_id: result.data.id,
        locations: await listActiveLocationNames(db),
      },
      { status: 201 }
    );
  } catch (error) {
    return handleRouteError(error, 'add inventory location');
  }
}
