import { Router } from "express";
import { AppDeps, handle } from "../http/context";

export function createPagesRouter(deps: AppDeps): Router {
  const router = Router();

  router.get(
    "/about",
    handle(deps, async (ctx) => {
      ctx.render("about");
    })
  );

  router.get(
    "/contact",
    handle(deps, async (ctx) => {
      ctx.render("contact");
    })
  );

  return router;
}
