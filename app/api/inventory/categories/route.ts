import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { authorizeApiRequest, clientIp, handleRouteError, jsonError } from '@/lib/api';
import { Capability } from '@/lib/constants/enums';
import { getPool } from '@/lib/db';
import { addCategory, listActiveCategories, listCategories } from '@/lib/inventory/config';
import { failureStatus } from '@/lib/inventory/responses';

const createSchema = z.object({
  key_name: z.string().max(100),
  display_name: z.string().max(255),
});

// GET /api/inventory/categories - All categories, inactive included
export async function GET(req: NextRequest) {
  try {
    const authz = await authorizeApiRequest(req, Capability.EDIT_INVENTORY);
    if (!authz.ok) return authz.response;

    const categories = await listCategories(getPool());
    return NextResponse.json({ success: true, message: '', categories });
  } catch (error) {
    return handleRouteError(error, 'fetch inventory categories');
  }
}

// POST /api/inventory/categories - Add a category
export async function POST(req: NextRequest) {
  try {
    const authz = await authorizeApiRequest(req, Capability.EDIT_INVENTORY, { csrf: true });
    if (!authz.ok) return authz.response;

    const body = createSchema.parse(await req.json());
    const db = getPool();
    const result = await addCategory(db, body.key_name, body.display_name, {
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
        category: {
          id: result.data.id,
          key_name: result.data.keyName,
          display_name: result.data.displayName,
        },
        categories: await listActiveCategories(db),
      },
      { status: 201 }
    );
  } catch (error) {
    return handleRouteError(error, 'add inventory category');
  }
}
