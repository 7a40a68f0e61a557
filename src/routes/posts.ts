import { Router } from "express";
import { requireAdministrator } from "../auth/policy";
import { ConflictError, NotFoundError } from "../errors";
import {
  CommentForm,
  CreatePostForm,
  CreatePostInput,
  emptyForm,
  validateForm,
} from "../forms";
import { AppDeps, RequestContext, handle, parseId } from "../http/context";
import { Post } from "../models/types";
import { formatPostDate } from "../utils/date";

const TITLE_TAKEN = "A post with that title already exists.";

function postFormValues(post: Post) {
  return {
    title: post.title,
    subtitle: post.subtitle,
    img_url: post.imgUrl,
    body: post.body,
  };
}

async function loadPost(ctx: RequestContext) {
  const post = await ctx.deps.store.posts.findById(parseId(ctx.req.params.postId));
  if (!post) {
    throw new NotFoundError();
  }
  return post;
}

/**
 * 同じタイトルの別の投稿があれば true
 */
async function titleTaken(
  ctx: RequestContext,
  input: CreatePostInput,
  exceptId?: number
): Promise<boolean> {
  const existing = await ctx.deps.store.posts.findByTitle(input.title);
  return existing !== null && existing.id !== exceptId;
}

export function createPostsRouter(deps: AppDeps): Router {
  const router = Router();

  router.get(
    "/",
    handle(deps, async (ctx) => {
      const posts = await deps.store.posts.list();
      ctx.render("index", { posts });
    })
  );

  router.get(
    "/post/:postId",
    handle(deps, async (ctx) => {
      const post = await loadPost(ctx);
      const comments = await deps.store.comments.listForPost(post.id);
      ctx.render("post", { post, comments, form: emptyForm() });
    })
  );

  router.post(
    "/post/:postId",
    handle(deps, async (ctx) => {
      const post = await loadPost(ctx);

      const result = validateForm(CommentForm, ctx.req.body);
      if (!result.success) {
        const comments = await deps.store.comments.listForPost(post.id);
        ctx.render("post", { post, comments, form: result.form }, 400);
        return;
      }

      if (!ctx.identity.authenticated) {
        ctx.flash("You must login or register to comment.");
        ctx.redirect("/login");
        return;
      }

      await deps.store.comments.create({
        text: result.data.comment,
        authorId: ctx.identity.user.id,
        postId: post.id,
      });
      ctx.redirect(`/post/${post.id}`);
    })
  );

  router.get(
    "/new-post",
    handle(deps, async (ctx) => {
      requireAdministrator(ctx.identity);
      ctx.render("make-post", { form: emptyForm(), isEdit: false });
    })
  );

  router.post(
    "/new-post",
    handle(deps, async (ctx) => {
      const admin = requireAdministrator(ctx.identity);

      const result = validateForm(CreatePostForm, ctx.req.body);
      if (!result.success) {
        ctx.render("make-post", { form: result.form, isEdit: false }, 400);
        return;
      }
      const input = result.data;

      if (await titleTaken(ctx, input)) {
        ctx.flash(TITLE_TAKEN);
        ctx.redirect("/new-post");
        return;
      }

      try {
        await deps.store.posts.create({
          title: input.title,
          subtitle: input.subtitle,
          body: input.body,
          imgUrl: input.img_url,
          authorId: admin.user.id,
          date: formatPostDate(deps.now()),
        });
      } catch (error) {
        if (error instanceof ConflictError) {
          ctx.flash(TITLE_TAKEN);
          ctx.redirect("/new-post");
          return;
        }
        throw error;
      }

      ctx.redirect("/");
    })
  );

  router.get(
    "/edit-post/:postId",
    handle(deps, async (ctx) => {
      requireAdministrator(ctx.identity);
      const post = await loadPost(ctx);
      ctx.render("make-post", {
        form: emptyForm(postFormValues(post)),
        post,
        isEdit: true,
      });
    })
  );

  router.post(
    "/edit-post/:postId",
    handle(deps, async (ctx) => {
      const admin = requireAdministrator(ctx.identity);
      const post = await loadPost(ctx);

      const result = validateForm(CreatePostForm, ctx.req.body);
      if (!result.success) {
        ctx.render("make-post", { form: result.form, post, isEdit: true }, 400);
        return;
      }
      const input = result.data;

      if (await titleTaken(ctx, input, post.id)) {
        ctx.flash(TITLE_TAKEN);
        ctx.redirect(`/edit-post/${post.id}`);
        return;
      }

      try {
        const updated = await deps.store.posts.update(post.id, {
          title: input.title,
          subtitle: input.subtitle,
          body: input.body,
          imgUrl: input.img_url,
          // 編集した管理者が著者になる
          authorId: admin.user.id,
        });
        if (!updated) {
          throw new NotFoundError();
        }
      } catch (error) {
        if (error instanceof ConflictError) {
          ctx.flash(TITLE_TAKEN);
          ctx.redirect(`/edit-post/${post.id}`);
          return;
        }
        throw error;
      }

      ctx.redirect(`/post/${post.id}`);
    })
  );

  // 削除は管理者のみ。コメントも連鎖して削除される
  router.get(
    "/delete/:postId",
    handle(deps, async (ctx) => {
      requireAdministrator(ctx.identity);
      const post = await loadPost(ctx);
      await deps.store.posts.delete(post.id);
      ctx.redirect("/");
    })
  );

  return router;
}
