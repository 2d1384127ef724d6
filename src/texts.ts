// Fixed user-facing texts.

export const SERVICE_NAME = "Архитектор Прогрева";

export const WELCOME_TEXT =
  "👋 Привет! Я — Архитектор Прогрева.\n\n" +
  "Я соберу для тебя структуру прогрева, которая ведёт к продажам.\n\n" +
  "Расскажи, что хочешь продавать, и я задам несколько вопросов, " +
  "чтобы построить архитектуру прогрева под тебя 🔥";

export const RESET_TEXT = "🔄 История очищена. Начинаем с чистого листа!";

export const FALLBACK_TEXT =
  "⚠️ Произошла ошибка при обращении к модели. Попробуй ещё раз.";
