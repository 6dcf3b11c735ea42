import {
  type ContentFilter,
  KeyInputController,
  type KeyOutcome,
  type KeyPress,
  type PasswordSession,
  type PlayerView,
} from "@passgate/core";
import { useCallback, useEffect, useMemo, useState } from "react";

export function usePasswordGame(
  session: PasswordSession,
  isDisallowed: ContentFilter,
) {
  const [view, setView] = useState<PlayerView>(() => session.getView());

  const controller = useMemo(
    () => new KeyInputController(session, { isDisallowed }),
    [session, isDisallowed],
  );

  useEffect(() => session.subscribe(setView), [session]);

  const handleKey = useCallback(
    (key: KeyPress): KeyOutcome => controller.handle(key),
    [controller],
  );

  return { view, handleKey };
}
