import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { render, act, cleanup, fireEvent } from "@testing-library/react";
import StartScreen from "@/components/StartScreen";
import { gameBridge } from "@/game/bridge";

beforeEach(() => {
  gameBridge.setPhase("start");
  gameBridge.setBestScore(0);
  gameBridge.resetRun();
});

afterEach(() => {
  cleanup();
});

describe("StartScreen", () => {
  it("shows the title and the arrow-key prompt", () => {
    const { getByRole, getByText } = render(<StartScreen />);
    expect(getByRole("heading", { level: 1 }).textContent).toBe("Grid Snake");
    expect(getByText("Press an arrow key")).toBeTruthy();
  });

  it("hides the session best until something was scored", () => {
    const { queryByTestId } = render(<StartScreen />);
    expect(queryByTestId("session-best")).toBeNull();
  });

  it("shows the session best once there is one", () => {
    const { getByTestId } = render(<StartScreen />);
    act(() => gameBridge.setBestScore(6));
    expect(getByTestId("session-best").textContent).toBe("Session best: 6");
  });

  it("the Start Run button switches the bridge to playing", () => {
    const { getByTestId, queryByLabelText } = render(<StartScreen />);
    act(() => {
      fireEvent.click(getByTestId("start-run"));
    });
    expect(gameBridge.getState().phase).toBe("playing");
    expect(queryByLabelText("Start screen")).toBeNull();
  });

  it("renders nothing outside the start phase", () => {
    gameBridge.setPhase("gameOver");
    const { container } = render(<StartScreen />);
    expect(container.innerHTML).toBe("");
  });
});
