import { Router } from "express";
import { hashPassword, verifyPassword } from "../auth/passwords";
import { login, logout } from "../auth/session";
import { ConflictError } from "../errors";
import { LoginForm, RegisterForm, emptyForm, validateForm } from "../forms";
import { AppDeps, handle } from "../http/context";

const EMAIL_TAKEN = "A user with that email already exists.";

export function createAuthRouter(deps: AppDeps): Router {
  const router = Router();

  router.get(
    "/register",
    handle(deps, async (ctx) => {
      ctx.render("register", { form: emptyForm() });
    })
  );

  router.post(
    "/register",
    handle(deps, async (ctx) => {
      const result = validateForm(RegisterForm, ctx.req.body);
      if (!result.success) {
        ctx.render("register", { form: result.form }, 400);
        return;
      }
      const { email, password, name } = result.data;

      if (await deps.store.users.findByEmail(email)) {
        ctx.flash(EMAIL_TAKEN);
        ctx.redirect("/login");
        return;
      }

      try {
        const user = await deps.store.users.create({
          email,
          passwordHash: await hashPassword(password, deps.bcryptRounds),
          name,
        });
        login(ctx.req, user);
      } catch (error) {
        // 同時登録で一意制約に当たった場合
        if (error instanceof ConflictError) {
          ctx.flash(EMAIL_TAKEN);
          ctx.redirect("/login");
          return;
        }
        throw error;
      }

      ctx.redirect("/");
    })
  );

  router.get(
    "/login",
    handle(deps, async (ctx) => {
      ctx.render("login", { form: emptyForm() });
    })
  );

  router.post(
    "/login",
    handle(deps, async (ctx) => {
      const result = validateForm(LoginForm, ctx.req.body);
      if (!result.success) {
        ctx.render("login", { form: result.form }, 400);
        return;
      }
      const { email, password } = result.data;

      const user = await deps.store.users.findByEmail(email);
      if (!user) {
        ctx.flash("That email does not exist. Please try again.");
        ctx.redirect("/login");
        return;
      }

      if (!(await verifyPassword(password, user.passwordHash))) {
        ctx.flash("Password incorrect. Please try again.");
        ctx.redirect("/login");
        return;
      }

      login(ctx.req, user);
      ctx.redirect("/");
    })
  );

  router.get(
    "/logout",
    handle(deps, async (ctx) => {
      logout(ctx.req);
      ctx.redirect("/");
    })
  );

  return router;
}
