import { Router } from "express";
import { requireAuthenticated, requireCommentOwner } from "../auth/policy";
import { ForbiddenError } from "../errors";
import { AppDeps, handle, parseId } from "../http/context";

export function createCommentsRouter(deps: AppDeps): Router {
  const router = Router();

  /**
   * コメント作成者本人のみ削除できる。存在しないコメントも 403 にする。
   * 戻り先はパスの postId ではなくコメントが属する投稿
   */
  router.get(
    "/delete_comment/:commentId/:postId",
    handle(deps, async (ctx) => {
      requireAuthenticated(ctx.identity);

      const comment = await deps.store.comments.findById(
        parseId(ctx.req.params.commentId)
      );
      if (!comment) {
        throw new ForbiddenError();
      }
      requireCommentOwner(ctx.identity, comment);

      await deps.store.comments.delete(comment.id);
      ctx.redirect(`/post/${comment.postId}`);
    })
  );

  return router;
}
