import {
  exerciseCatalogue,
  exerciseInsights,
  goalCurrentValue,
  goalProgress,
  mostFrequent,
} from "./exercise-insights";

describe("exercise insights", () => {
  const messages = (minutes: number) => exerciseInsights(minutes).map((i) => i.message);

  it("encourages a start when nothing was logged", () => {
    expect(messages(0)).toEqual([
      "Start exercising to see your weekly progress.",
      "Regular exercise is crucial for diabetes management. Start with light activities.",
      "Try 5 more 30-minute sessions this week to reach your goal.",
    ]);
  });

  it("rounds remaining sessions up", () => {
    expect(messages(40)).toEqual([
      "You've started exercising this week. Keep it up!",
      "Any exercise is beneficial for diabetes management. Try to increase gradually.",
      "Try 4 more 30-minute sessions this week to reach your goal.",
    ]);
  });

  it("counts down the last half hour in minutes", () => {
    expect(messages(120)).toEqual([
      "Great progress! You're almost at your weekly goal.",
      "Good exercise routine! This helps with glucose metabolism and cardiovascular health.",
      "Just 30 more minutes to reach your weekly goal!",
    ]);
  });

  it("suggests strength training once the goal is met", () => {
    expect(exerciseInsights(180)).toEqual([
      {
        type: "progress",
        title: "Weekly Progress",
        message: "Excellent! You've exceeded your weekly exercise goal.",
      },
      {
        type: "benefit",
        title: "Diabetes Benefits",
        message:
          "Excellent! Regular exercise helps improve insulin sensitivity and blood sugar control.",
      },
      {
        type: "recommendation",
        title: "Recommendation",
        message: "You've met your weekly goal! Consider adding strength training twice a week.",
      },
    ]);
  });

  it("lists workout types with their category", () => {
    const catalogue = exerciseCatalogue();

    expect(catalogue.types).toContainEqual({ type: "Yoga", category: "Flexibility" });
    expect(catalogue.types).toHaveLength(12);
    expect(catalogue.intensities[0]).toEqual({
      intensity: "Light",
      description: "Easy pace, can hold conversation",
    });
  });

  // -- goals --------------------------------------------------------------------

  it("caps goal progress at 1 and treats a zero target as no progress", () => {
    expect(goalProgress(75, 150)).toBe(0.5);
    expect(goalProgress(300, 150)).toBe(1);
    expect(goalProgress(10, 0)).toBe(0);
  });

  it("derives the current value from workouts by goal type", () => {
    const list = [
      { type: "Running" as const, intensity: "Vigorous" as const, duration: 30, calories: 300, distance: 3.5 },
      { type: "Yoga" as const, intensity: "Light" as const, duration: 45, calories: 120, distance: null },
    ];

    expect(goalCurrentValue("Duration", list)).toBe(75);
    expect(goalCurrentValue("Frequency", list)).toBe(2);
    expect(goalCurrentValue("Calories", list)).toBe(420);
    expect(goalCurrentValue("Distance", list)).toBe(3.5);
  });

  it("breaks frequency ties by first occurrence", () => {
    expect(mostFrequent(["Yoga", "Running", "Running", "Yoga"])).toBe("Yoga");
    expect(mostFrequent(["Yoga", "Running", "Running"])).toBe("Running");
    expect(mostFrequent([])).toBeNull();
  });
});
