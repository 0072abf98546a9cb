import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, noContent, fieldError, internalError } from "@/lib/api/response-helpers";
import { parseJsonBody, requestOrigin } from "@/lib/api/request-helpers";
import { requireUser } from "@/lib/auth/session";
import { avatarSchema } from "@/lib/validation/request-schema";
import { deleteImage, mediaUrl, saveImage } from "@/lib/media/images";

/**
 * PUT /api/users/me/avatar
 * Body: { avatar: "data:image/png;base64,..." }. Replaces any previous avatar.
 */
export async function PUT(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, avatarSchema);
    if (!body.ok) return body.response;

    const avatar = await saveImage(body.data.avatar, "users/avatars");
    try {
      await db.updateUser(auth.user.id, { avatar });
    } catch (err) {
      await deleteImage(avatar);
      throw err;
    }
    if (auth.user.avatar) await deleteImage(auth.user.avatar);

    return json({ avatar: mediaUrl(requestOrigin(request), avatar) });
  } catch (err) {
    console.error("PUT /api/users/me/avatar error:", err);
    return internalError(err);
  }
}

export async function DELETE(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    const current = auth.user.avatar;
    if (!current) {
      return fieldError("avatar", "Avatar is not set.");
    }

    await db.updateUser(auth.user.id, { avatar: null });
    await deleteImage(current);
    return noContent();
  } catch (err) {
    console.error("DELETE /api/users/me/avatar error:", err);
    return internalError(err);
  }
}
