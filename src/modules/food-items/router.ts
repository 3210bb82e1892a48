import { Router, type Request, type Response } from "express";
import { apiErr, apiOk } from "../../middleware/respond";
import type { FoodItemService } from "./service";
import type { FieldErrors } from "./validation";

function notFound(req: Request, res: Response, id: string) {
  const r = apiErr(req, "FOOD_ITEM_NOT_FOUND", `Food item ${id} was not found.`, 404);
  return res.status(r.status).json(r.body);
}

function invalid(req: Request, res: Response, errors: FieldErrors) {
  const r = apiErr(req, "VALIDATION_FAILED", "One or more fields are invalid.", 400, errors);
  return res.status(r.status).json(r.body);
}

export function foodItemsRouter(service: FoodItemService) {
  const r = Router();

  r.get("/", (req, res) => {
    res.json(apiOk(req, service.list()));
  });

  r.get("/:id", (req, res) => {
    const item = service.getById(req.params.id);
    if (!item) return notFound(req, res, req.params.id);
    return res.json(apiOk(req, item));
  });

  r.post("/", (req, res) => {
    const out = service.create(req.body);
    if (!out.ok) return invalid(req, res, out.errors);

    req.log.info({ foodItemId: out.item.id }, "food item created");
    return res.status(201).location(`${req.baseUrl}/${out.item.id}`).json(apiOk(req, out.item));
  });

  r.put("/:id", (req, res) => {
    const out = service.update(req.params.id, req.body);
    if (!out.ok) {
      return out.reason === "NOT_FOUND"
        ? notFound(req, res, req.params.id)
        : invalid(req, res, out.errors);
    }

    req.log.info({ foodItemId: out.item.id }, "food item updated");
    return res.json(apiOk(req, out.item));
  });

  r.delete("/:id", (req, res) => {
    if (!service.delete(req.params.id)) return notFound(req, res, req.params.id);

    req.log.info({ foodItemId: req.params.id }, "food item deleted");
    return res.status(204).end();
  });

  return r;
}
